export type { CatalogClient, CatalogEntry, CatalogSession, ItemRecord } from './types.js';
export { HttpCatalogClient, parseItemRecord, parseLibraryPage } from './http-catalog-client.js';
export type { HttpCatalogClientOptions } from './http-catalog-client.js';
