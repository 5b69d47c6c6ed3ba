export { runBulkDownload } from './bulk';
export type { BulkDownloadOptions, BulkDownloadHooks, BulkDownloadResult } from './bulk';

export { runSccmDownload, SCCM_DIRECTORY } from './sccm';
export type { SccmDownloadOptions, SccmDownloadHooks, SccmDownloadResult, SccmWorkflowDeps } from './sccm';

export { buildDownloadTasks, buildSccmTasks } from './tasks';
export type { DriverCatalog, CatalogHooks } from './types';
