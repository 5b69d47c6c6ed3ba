import * as fs from 'fs-extra';
import * as path from 'path';
import type {
  DownloadProgressEvent,
  DownloadTask,
  ProductDescriptor,
  SccmPackage,
  SelectionProvider,
  TransferOutcome,
  TransferSummary,
} from '../../types';
import type { DownloadManager } from '../downloadManager';
import { InvalidSelectionError } from '../errors';
import type { CatalogFetchDegradedError } from '../errors';
import type { ExtractionResult, SccmExtractor } from '../extractor/sccmExtractor';
import { extractionTargetFor } from '../extractor/sccmExtractor';
import { writeManifest } from '../packager/manifestWriter';
import { CatalogResolver } from '../resolver/catalogResolver';
import { getSccmPackages, SCCM_PACKAGE_EXTENSION } from '../selection';
import { buildSccmTasks } from './tasks';
import type { CatalogHooks, DriverCatalog } from './types';
import logger from '../../utils/logger';

export const SCCM_DIRECTORY = 'SCCM';

export interface SccmDownloadOptions {
  serialNumber: string;
  outputPath: string;
  selection: SelectionProvider;
  /** false면 다운로드만 수행 */
  extract: boolean;
}

export interface SccmDownloadHooks extends CatalogHooks {
  onPackagesFound?: (packages: SccmPackage[]) => void;
  onPackagesSelected?: (packages: SccmPackage[]) => void;
  onFileStart?: (task: DownloadTask) => void;
  onFileProgress?: (event: DownloadProgressEvent) => void;
  onFileDone?: (outcome: TransferOutcome) => void;
  onExtractStart?: (archivePath: string) => void;
  onExtractDone?: (result: ExtractionResult) => void;
}

export interface SccmWorkflowDeps {
  catalog: DriverCatalog;
  manager: DownloadManager;
  extractor: SccmExtractor;
}

export type SccmDownloadResult =
  | { status: 'no-packages'; product: ProductDescriptor; warnings: CatalogFetchDegradedError[] }
  | { status: 'cancelled'; product: ProductDescriptor; packages: SccmPackage[] }
  | {
      status: 'completed' | 'interrupted';
      product: ProductDescriptor;
      packages: SccmPackage[];
      selected: SccmPackage[];
      sccmDir: string;
      manifestPath: string;
      summary: TransferSummary;
      extractions: ExtractionResult[];
    };

/**
 * SCCM 드라이버 팩 다운로드
 *
 * 선택이 취소되면 디렉토리나 매니페스트를 만들지 않는다.
 * 다운로드는 한 번에 하나씩 바이트 진행률과 함께 진행하고, 끝난 뒤 .exe를 차례로 압축 해제한다.
 */
export async function runSccmDownload(
  deps: SccmWorkflowDeps,
  options: SccmDownloadOptions,
  hooks: SccmDownloadHooks = {}
): Promise<SccmDownloadResult> {
  const { catalog, manager, extractor } = deps;
  const serialNumber = CatalogResolver.normalizeIdentifier(options.serialNumber);

  const product = await catalog.resolve(serialNumber);
  hooks.onProductResolved?.(product);

  const { drivers, warnings } = await catalog.listDrivers(product);
  hooks.onDriversListed?.(drivers, warnings);

  const packages = getSccmPackages(drivers);
  if (packages.length === 0) {
    logger.warn('SCCM 패키지 없음', { serialNumber, product: product.id });
    return { status: 'no-packages', product, warnings };
  }
  hooks.onPackagesFound?.(packages);

  const selection = await options.selection.select(packages);
  if (selection.kind === 'cancelled') {
    logger.info('SCCM 패키지 선택 취소', { serialNumber });
    return { status: 'cancelled', product, packages };
  }

  const selected = pickPackages(packages, selection.indices);
  hooks.onPackagesSelected?.(selected);

  const sccmDir = path.join(options.outputPath, SCCM_DIRECTORY);
  await fs.ensureDir(sccmDir);
  const manifestPath = await writeManifest(options.outputPath, { serialNumber, product, drivers });
  hooks.onManifestWritten?.(manifestPath);

  const summary = await downloadSequentially(manager, buildSccmTasks(selected, sccmDir), sccmDir, hooks);
  if (manager.cancelled) {
    return {
      status: 'interrupted',
      product,
      packages,
      selected,
      sccmDir,
      manifestPath,
      summary,
      extractions: [],
    };
  }

  const extractions = options.extract ? await extractArchives(extractor, summary.outcomes, hooks) : [];

  return { status: 'completed', product, packages, selected, sccmDir, manifestPath, summary, extractions };
}

async function downloadSequentially(
  manager: DownloadManager,
  tasks: DownloadTask[],
  sccmDir: string,
  hooks: SccmDownloadHooks
): Promise<TransferSummary> {
  const onStart = (task: DownloadTask) => hooks.onFileStart?.(task);
  const onDone = (outcome: TransferOutcome) => hooks.onFileDone?.(outcome);

  manager.on('itemStart', onStart);
  manager.on('itemComplete', onDone);
  manager.on('itemSkipped', onDone);
  manager.on('itemFailed', onDone);

  try {
    return await manager.run(tasks, {
      outputPath: sccmDir,
      concurrency: 1,
      onFileProgress: (task, downloadedBytes, totalBytes) =>
        hooks.onFileProgress?.({
          itemId: task.id,
          progress: totalBytes > 0 ? Math.round((downloadedBytes / totalBytes) * 100) : 0,
          downloadedBytes,
          totalBytes,
        }),
    });
  } finally {
    manager.off('itemStart', onStart);
    manager.off('itemComplete', onDone);
    manager.off('itemSkipped', onDone);
    manager.off('itemFailed', onDone);
  }
}

/**
 * 받았거나 이미 있던 .exe를 <SCCM>/<파일명>/으로 차례로 압축 해제
 */
async function extractArchives(
  extractor: SccmExtractor,
  outcomes: TransferOutcome[],
  hooks: SccmDownloadHooks
): Promise<ExtractionResult[]> {
  const archives = outcomes
    .filter((outcome) => outcome.status !== 'failed')
    .map((outcome) => outcome.filePath)
    .filter((filePath) => path.extname(filePath).toLowerCase() === SCCM_PACKAGE_EXTENSION);

  const results: ExtractionResult[] = [];
  for (const archivePath of new Set(archives)) {
    hooks.onExtractStart?.(archivePath);
    const result = await extractor.extract(archivePath, extractionTargetFor(archivePath));
    hooks.onExtractDone?.(result);
    results.push(result);
  }
  return results;
}

/**
 * 선택기가 돌려준 0-based 인덱스로 패키지 선택. 범위를 벗어나면 파일을 만들기 전에 에러
 */
function pickPackages(packages: SccmPackage[], indices: number[]): SccmPackage[] {
  return indices.map((index) => {
    if (!Number.isInteger(index) || index < 0 || index >= packages.length) {
      const token = String(index + 1);
      throw new InvalidSelectionError(token, `잘못된 번호입니다: ${token}. 1부터 ${packages.length} 사이여야 합니다`);
    }
    return packages[index];
  });
}
