import safeStringify from 'fast-safe-stringify';

/**
 * Turns values into the strings stored by the remote backend and back.
 * `deserialize` throws on a payload it cannot read; the store reports that as a miss.
 */
export interface CacheCodec {
  serialize(value: unknown): string;
  deserialize(payload: string): unknown;
}

export class JsonCacheCodec implements CacheCodec {
  public serialize(value: unknown): string {
    return safeStringify(value);
  }

  public deserialize(payload: string): unknown {
    return JSON.parse(payload);
  }
}
