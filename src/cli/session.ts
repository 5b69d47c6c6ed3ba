import chalk from 'chalk';
import * as path from 'path';
import { getConfigManager, createClientConfig, Config, validateConcurrency } from '../core/config';
import { CatalogResolver } from '../core/resolver/catalogResolver';
import { DownloadManager, createDownloadManager } from '../core/downloadManager';
import { SccmExtractor } from '../core/extractor/sccmExtractor';
import { InteractiveSelectionProvider } from '../core/selection';
import { ConfigurationError, DriverToolError, describeError } from '../core/errors';
import type { CatalogFetchDegradedError } from '../core/errors';
import type { ProductDescriptor } from '../types';
import logger from '../utils/logger';

/**
 * 명령 하나가 쓰는 조회기/전송 엔진/압축 해제기 묶음
 */
export interface CliSession {
  config: Config;
  resolver: CatalogResolver;
  manager: DownloadManager;
  extractor: SccmExtractor;
}

// SIGINT 시 취소할 전송 엔진과 패키지 선택 프롬프트
let activeManager: DownloadManager | null = null;
let activePrompt: InteractiveSelectionProvider | null = null;

/**
 * 명령 하나를 위한 세션. 이후 로그에는 명령과 시리얼 번호가 붙는다.
 */
export function createSession(command: string, serialNumber: string): CliSession {
  logger.setRunContext({ command, serial: CatalogResolver.normalizeIdentifier(serialNumber) });
  const config = getConfigManager().getConfig();
  const clientConfig = createClientConfig(config);
  const manager = createDownloadManager(clientConfig);
  activeManager = manager;

  return {
    config,
    resolver: new CatalogResolver(clientConfig),
    manager,
    extractor: new SccmExtractor({
      timeoutMs: config.extractTimeoutMs,
      outerTimeoutMs: config.outerExtractTimeoutMs,
    }),
  };
}

/**
 * SIGINT로 닫을 수 있는 대화형 선택기
 */
export function createInteractiveSelection(): InteractiveSelectionProvider {
  activePrompt = new InteractiveSelectionProvider();
  return activePrompt;
}

/**
 * 선택 프롬프트가 열려 있으면 닫는다 (선택은 취소로 끝나고 프로세스는 계속)
 */
export function interruptActivePrompt(): boolean {
  return activePrompt?.interrupt() ?? false;
}

/**
 * 진행 중인 다운로드 취소 (SIGINT 핸들러용)
 */
export function cancelActiveDownload(): void {
  activeManager?.cancelDownload();
}

/**
 * 기본 출력 경로: drivers_<시리얼>
 */
export function resolveOutputPath(serialNumber: string, output?: string): string {
  return path.resolve(output ?? `drivers_${CatalogResolver.normalizeIdentifier(serialNumber)}`);
}

/**
 * 명령행 숫자 인자 파싱
 */
export function parseWorkers(value: string | undefined, fallback: number): number {
  if (value === undefined) return validateConcurrency(fallback);
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigurationError(`동시 다운로드 수는 1 이상의 정수여야 합니다: ${value}`);
  }
  return validateConcurrency(Number(value));
}

export function printHeader(): void {
  console.log(chalk.cyan('='.repeat(60)));
  console.log(chalk.cyan('  Lenovo 드라이버 다운로더'));
  console.log(chalk.cyan('='.repeat(60)));
}

export function printProduct(product: ProductDescriptor): void {
  console.log(chalk.green(`✓ 제품 확인: ${product.name}`));
  console.log(chalk.gray(`  ID: ${product.id}`));
}

export function printWarnings(warnings: CatalogFetchDegradedError[]): void {
  for (const warning of warnings) {
    console.log(chalk.yellow(`⚠ ${warning.message}`));
  }
}

/**
 * 명령 실패 처리: 메시지 출력 후 종료 코드 1
 */
export function exitWithError(error: unknown): never {
  if (error instanceof DriverToolError) {
    console.error(chalk.red(`✗ ${error.message}`));
  } else {
    console.error(chalk.red(`오류: ${describeError(error)}`));
  }
  if (error instanceof Error) {
    logger.logError(error, '명령 실패');
  } else {
    logger.error('명령 실패', { error: describeError(error) });
  }
  process.exit(1);
}

/**
 * 바이트 포맷
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * 카탈로그에 적힌 크기 표시 (숫자는 바이트, 문자열은 그대로)
 */
export function formatDeclaredSize(size: number | string): string {
  if (typeof size === 'string') return size || '크기 알 수 없음';
  return size > 0 ? formatBytes(size) : '크기 알 수 없음';
}
