// Physical key layout for values, prefix indexes, the prefix catalog and hash entries
import { CachingOptions } from '../Options';

const INDEX_SUFFIX = ':__index';
const CATALOG_SUFFIX = ':__prefix_catalog';
const HASH_SEGMENT = '__hash:';

export const buildCacheKey = (options: CachingOptions, logicalKey: string): string => {
  return `${options.keyPrefix}:${logicalKey}`;
};

export const buildPrefixKey = (options: CachingOptions, prefix: string): string => {
  return `${options.keyPrefix}:${prefix}`;
};

export const buildIndexKey = (prefixKey: string): string => {
  return `${prefixKey}${INDEX_SUFFIX}`;
};

export const buildCatalogKey = (options: CachingOptions): string => {
  return `${options.keyPrefix}${CATALOG_SUFFIX}`;
};

export const buildHashKey = (hash: string): string => {
  return `${HASH_SEGMENT}${hash}`;
};

/**
 * Derive the aggregate prefix of a logical key from its shape.
 *
 * The prefix is everything before the first colon whose following segment
 * contains an `=`; a key without such a segment is its own prefix.
 *
 * ```
 * extractPrefix('Employees:GetAll:page=1:size=10') // 'Employees:GetAll'
 * extractPrefix('Dashboard:Metrics')               // 'Dashboard:Metrics'
 * ```
 */
export const extractPrefix = (logicalKey: string): string => {
  if (logicalKey.trim() === '') {
    return '';
  }

  let searchIndex = 0;
  while (searchIndex < logicalKey.length) {
    const colonIndex = logicalKey.indexOf(':', searchIndex);
    if (colonIndex < 0) {
      break;
    }

    const nextColonIndex = logicalKey.indexOf(':', colonIndex + 1);
    const segmentEnd = nextColonIndex < 0 ? logicalKey.length : nextColonIndex;
    if (logicalKey.slice(colonIndex + 1, segmentEnd).includes('=')) {
      return logicalKey.slice(0, colonIndex);
    }

    searchIndex = colonIndex + 1;
  }

  return logicalKey;
};
