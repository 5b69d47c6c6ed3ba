// Core module exports

// Catalog
export { CatalogResolver } from './resolver/catalogResolver';
export type { DriverListResult } from './resolver/catalogResolver';

// Selection
export * from './selection';

// Download Manager
export { DownloadManager, createDownloadManager, summarize, DEFAULT_CONCURRENCY } from './downloadManager';
export type { TransferOptions, OverallProgress, DownloadManagerEvents } from './downloadManager';
export { DriverFileDownloader, AxiosStreamSource, WRITE_BUFFER_SIZE } from './downloaders/driverDownloader';
export type { StreamSource, StreamResponse, ByteProgressCallback } from './downloaders/driverDownloader';

// Extractor
export { SccmExtractor, countInfFiles, extractionTargetFor } from './extractor/sccmExtractor';
export type { ExtractionResult, ExtractionStatus, SccmExtractorOptions } from './extractor/sccmExtractor';
export { ProcessToolRunner } from './extractor/toolRunner';
export type { ToolRunner, ToolRunResult, ToolRunOutcome } from './extractor/toolRunner';

// Manifest
export { writeManifest, createManifest, MANIFEST_FILENAME } from './packager/manifestWriter';

// Workflows
export * from './workflows';

// Config
export { ConfigManager, getConfigManager, createClientConfig, DEFAULT_CONFIG } from './config';
export type { Config, ClientConfig } from './config';

// Errors
export * from './errors';

// Types
export * from '../types';
