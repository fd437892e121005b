/**
 * Size estimation for in-process cache entries
 */
import safeStringify from 'fast-safe-stringify';

/**
 * Format bytes as a human-readable string
 *
 * @param binary - Use binary units (1024) instead of decimal (1000)
 */
export function formatBytes(bytes: number, binary: boolean = false): string {
  if (bytes === 0) return '0 B';
  if (bytes < 0) return `${bytes} B`;

  const k = binary ? 1024 : 1000;
  const sizes = binary
    ? ['B', 'KiB', 'MiB', 'GiB', 'TiB']
    : ['B', 'KB', 'MB', 'GB', 'TB'];

  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  const size = bytes / Math.pow(k, i);

  const formatted = size % 1 === 0 ? size.toString() : size.toFixed(1);
  return `${formatted} ${sizes[i]}`;
}

/**
 * Estimate how many bytes a cached value occupies.
 * An approximation: strings count two bytes per character, objects are
 * measured through their JSON form. Circular structures are serialized with
 * their cycles replaced, so they never throw.
 */
export function estimateValueSize(value: unknown): number {
  if (value === null || typeof value === 'undefined') {
    return 8;
  }

  switch (typeof value) {
    case 'boolean':
      return 4;
    case 'number':
    case 'bigint':
      return 8;
    case 'string':
      return value.length * 2;
    case 'object':
      if (Array.isArray(value)) {
        return value.reduce<number>((total, item) => total + estimateValueSize(item), 24);
      }
      try {
        return safeStringify(value).length * 2 + 16;
      } catch (error) {
        // toJSON implementations may throw
        return 64;
      }
    default:
      return 32;
  }
}
