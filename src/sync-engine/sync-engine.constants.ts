export const CATALOG_SYNC_QUEUE = 'catalog-sync';

export const SYNCHRONIZE_CATALOG_JOB = 'synchronize-catalog';
export const REFRESH_PRICES_JOB = 'refresh-prices';

export type CatalogSyncJobName = typeof SYNCHRONIZE_CATALOG_JOB | typeof REFRESH_PRICES_JOB;
