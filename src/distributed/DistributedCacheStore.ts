import { z } from 'zod';
import { CachingOptionsProvider } from '../Options';
import { CacheLookup, CacheStore } from '../CacheStore';
import { CacheEntryOptions } from '../ttl/CacheEntryOptions';
import { CacheCodec, JsonCacheCodec } from './CacheCodec';
import { KeyValueClient } from './KeyValueClient';
import { CacheKeyIndex } from '../hashing/CacheKeyIndex';
import LibLogger from '../logger';

const logger = LibLogger.get('DistributedCacheStore');

/**
 * What is written under a value's physical key. The deadline travels with
 * the value so sliding re-arms never outlive the absolute TTL.
 */
const envelopeSchema = z.object({
  value: z.unknown(),
  absoluteExpiresAt: z.number(),
  slidingTtlMs: z.number().positive().optional()
});

type CacheEnvelope = z.infer<typeof envelopeSchema>;

const trackedKeysSchema = z.array(z.string());

/**
 * Remote backend over a {@link KeyValueClient}. Values go through the
 * injected codec; prefix indexes and the catalog are JSON string lists.
 */
export class DistributedCacheStore extends CacheStore {
  private readonly client: KeyValueClient;
  private readonly codec: CacheCodec;

  public constructor(
    optionsProvider: CachingOptionsProvider,
    client: KeyValueClient,
    codec: CacheCodec = new JsonCacheCodec(),
    keyIndex?: CacheKeyIndex
  ) {
    super(optionsProvider, 'distributed/key-value', keyIndex);
    this.client = client;
    this.codec = codec;
  }

  protected async readEntry<T>(physicalKey: string): Promise<CacheLookup<T> | null> {
    const payload = await this.client.get(physicalKey);
    if (payload === null) {
      return null;
    }

    const envelope = this.decode(physicalKey, payload);
    if (!envelope) {
      return null;
    }

    const now = Date.now();
    const absoluteRemainingMs = envelope.absoluteExpiresAt - now;
    if (absoluteRemainingMs <= 0) {
      return null;
    }

    let remainingTtlMs = absoluteRemainingMs;
    if (envelope.slidingTtlMs) {
      remainingTtlMs = Math.min(envelope.slidingTtlMs, absoluteRemainingMs);
      await this.client.expire(physicalKey, remainingTtlMs);
    }

    return {
      // Envelopes are written by set<T>; the caller names the type it reads back
      value: envelope.value as T,
      remainingTtlMs
    };
  }

  protected async writeEntry<T>(physicalKey: string, value: T, entryOptions: CacheEntryOptions): Promise<boolean> {
    const envelope: CacheEnvelope = {
      value,
      absoluteExpiresAt: Date.now() + entryOptions.absoluteTtlMs
    };
    let ttlMs = entryOptions.absoluteTtlMs;
    if (entryOptions.slidingTtlMs && entryOptions.slidingTtlMs > 0) {
      envelope.slidingTtlMs = entryOptions.slidingTtlMs;
      ttlMs = Math.min(entryOptions.slidingTtlMs, entryOptions.absoluteTtlMs);
    }

    await this.client.set(physicalKey, this.codec.serialize(envelope), ttlMs);
    return true;
  }

  protected async deleteEntry(physicalKey: string): Promise<void> {
    await this.client.delete(physicalKey);
  }

  protected async readTrackedKeys(listKey: string): Promise<string[]> {
    const payload = await this.client.get(listKey);
    if (payload === null) {
      return [];
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(payload);
    } catch (error) {
      logger.debug('Tracked key list is not valid JSON', { listKey, error: String(error) });
      return [];
    }

    const parsed = trackedKeysSchema.safeParse(decoded);
    if (!parsed.success) {
      logger.debug('Tracked key list has an unexpected shape', { listKey });
      return [];
    }
    return parsed.data;
  }

  protected async writeTrackedKeys(listKey: string, keys: string[], ttlSeconds: number): Promise<void> {
    const currentTtlMs = await this.client.ttl(listKey);
    const ttlMs = Math.max(currentTtlMs ?? 0, ttlSeconds * 1000);
    await this.client.set(listKey, JSON.stringify(keys), ttlMs);
  }

  protected async deleteTrackedKeys(listKey: string): Promise<void> {
    await this.client.delete(listKey);
  }

  private decode(physicalKey: string, payload: string): CacheEnvelope | null {
    let decoded: unknown;
    try {
      decoded = this.codec.deserialize(payload);
    } catch (error) {
      logger.debug('Cached payload could not be decoded, treating as a miss', {
        physicalKey,
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }

    const parsed = envelopeSchema.safeParse(decoded);
    if (!parsed.success) {
      logger.debug('Cached payload has an unexpected shape, treating as a miss', { physicalKey });
      return null;
    }
    return parsed.data;
  }
}
