import LibLogger from './logger';

const logger = LibLogger.get('Options');

/**
 * Backing store used by the cache layer. Chosen once, at startup.
 */
export type CacheProviderName = 'Memory' | 'Distributed';

/**
 * How cache keys are shown in diagnostics output
 */
export type KeyDisplayMode =
  | 'Raw'   // the logical key as written by the caller
  | 'Hash'; // a one-way hash, resolvable through the hash index

export const CACHE_PROVIDERS: readonly CacheProviderName[] = ['Memory', 'Distributed'];
export const KEY_DISPLAY_MODES: readonly KeyDisplayMode[] = ['Raw', 'Hash'];
export const DEFAULT_CACHE_STATUS_HEADER = 'X-Cache-Status';
export const FALLBACK_CACHE_DURATION_SECONDS = 60;

/**
 * Per-endpoint TTL overrides
 */
export interface EndpointCacheOptions {
  /** Absolute TTL in seconds; values <= 0 fall back to the default duration */
  readonly absoluteTtlSeconds?: number;
  /** Sliding TTL in seconds; only applied when > 0 */
  readonly slidingTtlSeconds?: number;
}

export interface MemoryProviderSettings {
  /** Upper bound for the estimated size of cached values, in megabytes */
  readonly sizeLimitMB?: number;
}

export interface DistributedProviderSettings {
  /** Redis connection string, used when no client is supplied */
  readonly connectionString?: string;
  /** Minimum lifetime of prefix indexes, the prefix catalog and hash index entries */
  readonly indexKeyTtlSeconds: number;
}

export interface CacheDiagnosticsOptions {
  readonly emitCacheStatusHeader: boolean;
  readonly headerName: string;
  readonly keyDisplayMode: KeyDisplayMode;
}

/**
 * An immutable configuration snapshot. Every cache operation reads exactly one
 * snapshot from a {@link CachingOptionsProvider}; reloads replace the snapshot.
 */
export interface CachingOptions {
  readonly enabled: boolean;
  /** Hard kill switch, overrides `enabled` */
  readonly disableCache: boolean;
  readonly defaultCacheDurationSeconds: number;
  readonly provider: CacheProviderName;
  /** Namespace prepended to every physical key */
  readonly keyPrefix: string;
  readonly providerSettings: {
    readonly memory: MemoryProviderSettings;
    readonly distributed: DistributedProviderSettings;
  };
  /** Keys are stored lower-cased; look them up with {@link findEndpointOptions} */
  readonly perEndpoint: Readonly<Record<string, EndpointCacheOptions>>;
  readonly diagnostics: CacheDiagnosticsOptions;
}

/**
 * Raw configuration as it arrives from a config file or environment.
 * Provider and display mode names are matched case-insensitively.
 */
export interface CachingOptionsInput {
  enabled?: boolean;
  disableCache?: boolean;
  defaultCacheDurationSeconds?: number;
  provider?: string;
  keyPrefix?: string;
  providerSettings?: {
    memory?: { sizeLimitMB?: number };
    distributed?: { connectionString?: string; indexKeyTtlSeconds?: number };
  };
  perEndpoint?: Record<string, EndpointCacheOptions>;
  diagnostics?: {
    emitCacheStatusHeader?: boolean;
    headerName?: string;
    keyDisplayMode?: string;
  };
}

/**
 * Supplies the configuration snapshot for a single operation.
 */
export interface CachingOptionsProvider {
  current(): CachingOptions;
}

export interface ReloadableOptionsProvider extends CachingOptionsProvider {
  /**
   * Validate and swap in a new snapshot. The previous snapshot stays in place
   * if validation throws.
   */
  update(input: CachingOptionsInput): CachingOptions;
}

const DEFAULT_INDEX_KEY_TTL_SECONDS = 600;

const VALID_PROPERTIES = new Set([
  'enabled',
  'disableCache',
  'defaultCacheDurationSeconds',
  'provider',
  'keyPrefix',
  'providerSettings',
  'perEndpoint',
  'diagnostics'
]);

const PROPERTY_SUGGESTIONS: Record<string, string> = {
  'enable': 'enabled',
  'isEnabled': 'enabled',
  'disable': 'disableCache',
  'disabled': 'disableCache',
  'disable_cache': 'disableCache',
  'defaultTtlSeconds': 'defaultCacheDurationSeconds',
  'defaultTTL': 'defaultCacheDurationSeconds',
  'ttl': 'defaultCacheDurationSeconds',
  'cacheProvider': 'provider',
  'providers': 'provider',
  'prefix': 'keyPrefix',
  'key_prefix': 'keyPrefix',
  'endpoints': 'perEndpoint',
  'per_endpoint': 'perEndpoint',
  'diagnostic': 'diagnostics'
};

const matchName = <T extends string>(value: string, allowed: readonly T[]): T | undefined => {
  const lowered = value.trim().toLowerCase();
  return allowed.find(candidate => candidate.toLowerCase() === lowered);
};

/**
 * Map a configured provider name onto a known backend.
 * Throws for unknown names; call this at startup, never per request.
 */
export const resolveProviderName = (name: string | undefined): CacheProviderName => {
  if (typeof name === 'undefined' || name.trim() === '') {
    return 'Memory';
  }
  const provider = matchName(name, CACHE_PROVIDERS);
  if (!provider) {
    throw new Error(
      `Unknown cache provider "${name}". ` +
      `Supported providers are: ${CACHE_PROVIDERS.join(', ')}.`
    );
  }
  return provider;
};

const resolveKeyDisplayMode = (mode: string | undefined): KeyDisplayMode => {
  if (typeof mode === 'undefined' || mode.trim() === '') {
    return 'Raw';
  }
  const resolved = matchName(mode, KEY_DISPLAY_MODES);
  if (!resolved) {
    throw new Error(
      `Unknown diagnostics.keyDisplayMode "${mode}". ` +
      `Supported modes are: ${KEY_DISPLAY_MODES.join(', ')}.`
    );
  }
  return resolved;
};

const normalizePerEndpoint = (
  perEndpoint: Record<string, EndpointCacheOptions> | undefined
): Record<string, EndpointCacheOptions> => {
  const normalized: Record<string, EndpointCacheOptions> = {};
  for (const [name, endpoint] of Object.entries(perEndpoint ?? {})) {
    normalized[name.trim().toLowerCase()] = Object.freeze({ ...endpoint });
  }
  return normalized;
};

/**
 * Check raw configuration for mistakes that should stop the process at startup.
 * TTL values are not checked here: non-positive TTLs are clamped at use.
 */
export const validateCachingOptions = (input: CachingOptionsInput): void => {
  const unknownProperties = Object.keys(input).filter(key => !VALID_PROPERTIES.has(key));

  if (unknownProperties.length > 0) {
    const suggestions = unknownProperties.map(prop => {
      const suggestion = PROPERTY_SUGGESTIONS[prop];
      return suggestion ? `"${prop}" → "${suggestion}"` : `"${prop}"`;
    });

    throw new Error(
      `Unknown caching configuration properties detected: ${unknownProperties.join(', ')}.\n` +
      `Valid properties are: ${Array.from(VALID_PROPERTIES).join(', ')}.\n` +
      `Did you mean: ${suggestions.join(', ')}?`
    );
  }

  resolveProviderName(input.provider);
  resolveKeyDisplayMode(input.diagnostics?.keyDisplayMode);

  const sizeLimitMB = input.providerSettings?.memory?.sizeLimitMB;
  if (typeof sizeLimitMB === 'number' && (!Number.isInteger(sizeLimitMB) || sizeLimitMB <= 0)) {
    throw new Error(
      `providerSettings.memory.sizeLimitMB must be a positive integer, got ${sizeLimitMB}. ` +
      `Suggestion: omit it to leave the in-process cache unbounded.`
    );
  }

  if (typeof input.keyPrefix === 'string' && input.keyPrefix.includes('__')) {
    logger.warning('keyPrefix contains "__", which is also used by internal index keys', {
      keyPrefix: input.keyPrefix
    });
  }
};

/**
 * Build a frozen configuration snapshot from raw input, applying defaults.
 */
export const createCachingOptions = (input: CachingOptionsInput = {}): CachingOptions => {
  validateCachingOptions(input);

  const options: CachingOptions = {
    enabled: input.enabled ?? false,
    disableCache: input.disableCache ?? false,
    defaultCacheDurationSeconds: input.defaultCacheDurationSeconds ?? FALLBACK_CACHE_DURATION_SECONDS,
    provider: resolveProviderName(input.provider),
    keyPrefix: input.keyPrefix ?? 'app',
    providerSettings: Object.freeze({
      memory: Object.freeze({
        sizeLimitMB: input.providerSettings?.memory?.sizeLimitMB
      }),
      distributed: Object.freeze({
        connectionString: input.providerSettings?.distributed?.connectionString,
        indexKeyTtlSeconds: input.providerSettings?.distributed?.indexKeyTtlSeconds ?? DEFAULT_INDEX_KEY_TTL_SECONDS
      })
    }),
    perEndpoint: Object.freeze(normalizePerEndpoint(input.perEndpoint)),
    diagnostics: Object.freeze({
      emitCacheStatusHeader: input.diagnostics?.emitCacheStatusHeader ?? false,
      headerName: input.diagnostics?.headerName?.trim() || DEFAULT_CACHE_STATUS_HEADER,
      keyDisplayMode: resolveKeyDisplayMode(input.diagnostics?.keyDisplayMode)
    })
  };

  return Object.freeze(options);
};

/**
 * Whether cache reads and writes should happen under this snapshot.
 */
export const isCachingActive = (options: CachingOptions): boolean =>
  options.enabled && !options.disableCache;

/**
 * The default duration with non-positive values replaced by 60 seconds.
 */
export const effectiveDefaultDurationSeconds = (options: CachingOptions): number =>
  options.defaultCacheDurationSeconds > 0
    ? options.defaultCacheDurationSeconds
    : FALLBACK_CACHE_DURATION_SECONDS;

/**
 * Case-insensitive lookup of an endpoint override
 */
export const findEndpointOptions = (
  options: CachingOptions,
  endpointName: string
): EndpointCacheOptions | undefined => {
  const lookupKey = endpointName.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(options.perEndpoint, lookupKey)
    ? options.perEndpoint[lookupKey]
    : undefined;
};

export const createStaticOptionsProvider = (
  options: CachingOptions | CachingOptionsInput = {}
): CachingOptionsProvider => {
  const snapshot = isCachingOptions(options) ? options : createCachingOptions(options);
  return {
    current: () => snapshot
  };
};

export const createReloadableOptionsProvider = (
  initial: CachingOptionsInput = {}
): ReloadableOptionsProvider => {
  let snapshot = createCachingOptions(initial);

  return {
    current: () => snapshot,
    update: (input: CachingOptionsInput) => {
      const next = createCachingOptions(input);
      if (next.provider !== snapshot.provider) {
        logger.warning('Cache provider changes only take effect after a restart', {
          current: snapshot.provider,
          requested: next.provider
        });
      }
      snapshot = next;
      logger.debug('Caching configuration reloaded', {
        enabled: next.enabled,
        disableCache: next.disableCache,
        keyPrefix: next.keyPrefix
      });
      return next;
    }
  };
};

const isCachingOptions = (value: CachingOptions | CachingOptionsInput): value is CachingOptions =>
  Object.isFrozen(value) &&
  typeof value.provider === 'string' &&
  typeof value.providerSettings?.distributed?.indexKeyTtlSeconds === 'number' &&
  typeof value.diagnostics?.headerName === 'string';
