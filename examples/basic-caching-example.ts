/**
 * Basic Caching Example
 *
 * Wraps a slow query with get-or-compute caching on the in-process backend,
 * then drops every cached page for the endpoint with one prefix invalidation.
 */

import {
  cacheKey,
  createCachedQuery,
  createCachingInfrastructure,
  createStaticOptionsProvider
} from '../src';

interface EmployeesQuery {
  page: number;
  department?: string;
}

interface Employee {
  id: number;
  name: string;
  department: string;
}

const employees: Employee[] = [
  { id: 1, name: 'Ada', department: 'Engineering' },
  { id: 2, name: 'Grace', department: 'Engineering' },
  { id: 3, name: 'Alan', department: 'Research' }
];

let databaseCalls = 0;

const loadEmployees = async (query: EmployeesQuery): Promise<Employee[]> => {
  databaseCalls++;
  return employees.filter(employee =>
    !query.department || employee.department.toLowerCase() === query.department.toLowerCase());
};

async function basicCachingExample(): Promise<void> {
  console.log('🚀 Basic Caching Example\n');

  const optionsProvider = createStaticOptionsProvider({
    enabled: true,
    keyPrefix: 'demo',
    defaultCacheDurationSeconds: 60,
    perEndpoint: {
      Employees: { absoluteTtlSeconds: 30, slidingTtlSeconds: 10 }
    }
  });
  const { store, entryOptionsFactory, invalidation } = createCachingInfrastructure(optionsProvider);

  const getEmployees = createCachedQuery<EmployeesQuery, Employee[]>({
    endpoint: 'Employees',
    buildKey: query => cacheKey('Employees')
      .with('page', query.page)
      .filter('department', query.department)
      .build(),
    compute: loadEmployees
  }, { store, entryOptionsFactory, optionsProvider });

  await getEmployees({ page: 1, department: 'Engineering' });
  await getEmployees({ page: 1, department: ' engineering ' });
  await getEmployees({ page: 2 });
  console.log(`Three requests, ${databaseCalls} database calls`);

  await invalidation.invalidatePrefix('Employees');
  await getEmployees({ page: 1, department: 'Engineering' });
  console.log(`After invalidating the Employees prefix: ${databaseCalls} database calls`);

  console.log('Store statistics:', store.getStats());
  console.log('\n✅ Basic Caching Example Complete!');
}

export { basicCachingExample };

if (import.meta.url === `file://${process.argv[1]}`) {
  basicCachingExample().catch(console.error);
}
