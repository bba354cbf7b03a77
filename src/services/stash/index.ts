export { StashClient, toCatalogEntry, type StashClientOptions } from './client.js';

export type { CatalogEntry, CatalogIndex, StashScene } from './types.js';
