/**
 * wikibase-rdf-patch
 *
 * Library entry point: the diffing engine, the MediaWiki API client and the
 * shared Wikibase types.
 */

export * from './services/rdf-patch/index.js';
export { MediaWikiApiClient, type MediaWikiApiClientConfig } from './clients/MediaWikiApiClient.js';
export * from './types/errors.js';
export type * from './types/wikibase.js';
export { isMissingEntity, isKnownDataType, DATA_TYPE_VALUE_TYPES } from './types/wikibase.js';
export { RateLimiter } from './utils/RateLimiter.js';
export { logger, createLogger } from './utils/logger.js';
