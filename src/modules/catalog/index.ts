/**
 * @fileoverview Public exports for the Catalog module.
 * @module modules/catalog
 * @version 1.0.0
 */

export { CatalogStore, CatalogError } from './CatalogStore';
export { parseCatalogText, normalizeHeader } from './CatalogParser';
export { normalizeKey, sameKey, naturalCompare, lexicalCompare } from './normalize';
export type { ICatalogStore, CatalogStoreOptions } from './interfaces';
export type {
    ChannelRecord,
    CatalogWarning,
    CatalogWarningCode,
    ParsedCatalog,
} from './types';
export { DEFAULT_CATALOG_PATH, CATALOG_ERROR_MESSAGES } from './constants';
