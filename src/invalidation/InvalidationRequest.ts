import { z } from 'zod';
import { CacheCallContext } from '../CacheStore';
import { CacheInvalidationService } from './CacheInvalidationService';

export const invalidationRequestSchema = z.object({
  key: z.string().nullish(),
  prefix: z.string().nullish(),
  invalidateAll: z.boolean().nullish()
});

export type InvalidationRequest = z.infer<typeof invalidationRequestSchema>;

export type InvalidationAction = 'all' | 'key' | 'prefix';

export type InvalidationResult =
  | { ok: true; action: InvalidationAction }
  | { ok: false; error: string };

export const MISSING_TARGET_ERROR = 'Specify a key, prefix, or set invalidateAll=true.';

export interface InvalidationRequestOptions {
  signal?: AbortSignal;
  /** `invalidateAll` passed outside the body, e.g. as a query parameter */
  invalidateAll?: boolean;
}

const isPresent = (value: string | null | undefined): value is string =>
  typeof value === 'string' && value.trim() !== '';

/**
 * Apply an admin invalidation request. Exactly one action runs, chosen by
 * priority: invalidateAll, then key, then prefix. Blank strings count as
 * absent. A request without any usable field is rejected before the cache is
 * touched. Authorization is the caller's concern.
 */
export const handleInvalidationRequest = async (
  service: CacheInvalidationService,
  body: unknown,
  options: InvalidationRequestOptions = {}
): Promise<InvalidationResult> => {
  const parsed = invalidationRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') || 'body';
    return { ok: false, error: `Invalid invalidation request: ${path}: ${issue?.message ?? 'invalid value'}` };
  }

  const request = parsed.data;
  const context: CacheCallContext = { signal: options.signal };

  if (request.invalidateAll === true || options.invalidateAll === true) {
    await service.invalidateAll(context);
    return { ok: true, action: 'all' };
  }

  if (isPresent(request.key)) {
    await service.invalidateKey(request.key, context);
    return { ok: true, action: 'key' };
  }

  if (isPresent(request.prefix)) {
    await service.invalidatePrefix(request.prefix, context);
    return { ok: true, action: 'prefix' };
  }

  return { ok: false, error: MISSING_TARGET_ERROR };
};
