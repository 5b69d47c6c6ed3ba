import type { DownloadTask, DriverRecord, ProductDescriptor, TransferSummary } from '../../types';
import type { DownloadManager } from '../downloadManager';
import { summarize } from '../downloadManager';
import type { CatalogFetchDegradedError } from '../errors';
import { writeManifest } from '../packager/manifestWriter';
import { CatalogResolver } from '../resolver/catalogResolver';
import { filterByCategories } from '../selection';
import { buildDownloadTasks } from './tasks';
import type { CatalogHooks, DriverCatalog } from './types';
import logger from '../../utils/logger';

export interface BulkDownloadOptions {
  serialNumber: string;
  outputPath: string;
  categories?: string[];
  concurrency?: number;
}

export interface BulkDownloadHooks extends CatalogHooks {
  onFiltered?: (drivers: DriverRecord[], categories: string[]) => void;
  onTasksReady?: (tasks: DownloadTask[]) => void;
}

export interface BulkDownloadResult {
  product: ProductDescriptor;
  /** 필터 적용 후 목록 */
  drivers: DriverRecord[];
  manifestPath: string | null;
  summary: TransferSummary;
  warnings: CatalogFetchDegradedError[];
}

/**
 * 전체 드라이버 다운로드
 * 조회 → 목록 → 매니페스트(필터 전 목록) → 카테고리 필터 → 전송
 */
export async function runBulkDownload(
  catalog: DriverCatalog,
  manager: DownloadManager,
  options: BulkDownloadOptions,
  hooks: BulkDownloadHooks = {}
): Promise<BulkDownloadResult> {
  const serialNumber = CatalogResolver.normalizeIdentifier(options.serialNumber);

  const product = await catalog.resolve(serialNumber);
  hooks.onProductResolved?.(product);

  const { drivers, warnings } = await catalog.listDrivers(product);
  hooks.onDriversListed?.(drivers, warnings);

  if (drivers.length === 0) {
    logger.warn('다운로드할 드라이버 없음', { serialNumber });
    return {
      product,
      drivers,
      manifestPath: null,
      summary: summarize([], options.outputPath),
      warnings,
    };
  }

  const manifestPath = await writeManifest(options.outputPath, { serialNumber, product, drivers });
  hooks.onManifestWritten?.(manifestPath);

  const categories = options.categories ?? [];
  const selected = filterByCategories(drivers, categories);
  if (categories.length > 0) {
    hooks.onFiltered?.(selected, categories);
  }

  const tasks = buildDownloadTasks(selected, options.outputPath);
  hooks.onTasksReady?.(tasks);

  const summary = await manager.run(tasks, {
    outputPath: options.outputPath,
    concurrency: options.concurrency,
  });

  return { product, drivers: selected, manifestPath, summary, warnings };
}
