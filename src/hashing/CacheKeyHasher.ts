import { createHash } from 'node:crypto';

/**
 * One-way, deterministic hash of a logical key
 */
export interface CacheKeyHasher {
  hash(logicalKey: string): string;
}

export class Sha256CacheKeyHasher implements CacheKeyHasher {
  public hash(logicalKey: string): string {
    if (logicalKey.trim() === '') {
      return '';
    }
    return createHash('sha256').update(logicalKey, 'utf8').digest('hex');
  }
}
