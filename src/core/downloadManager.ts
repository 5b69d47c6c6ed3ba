import PQueue from 'p-queue';
import { EventEmitter } from 'eventemitter3';
import * as path from 'path';
import * as fs from 'fs-extra';
import type { DownloadTask, TransferOutcome, TransferSummary } from '../types';
import { ClientConfig, validateConcurrency } from './config';
import { AxiosStreamSource, DriverFileDownloader, ByteProgressCallback } from './downloaders/driverDownloader';
import { filenameFromUrl } from './shared/filename-utils';
import { describeError } from './errors';
import logger from '../utils/logger';

// 전송 옵션
export interface TransferOptions {
  outputPath: string;
  concurrency?: number;
  /** 파일별 바이트 진행률 (SCCM 패키지처럼 한 파일씩 지켜보는 경로용) */
  onFileProgress?: (task: DownloadTask, downloadedBytes: number, totalBytes: number) => void;
}

// 이벤트 타입
export interface DownloadManagerEvents {
  itemStart: (task: DownloadTask) => void;
  itemComplete: (outcome: TransferOutcome) => void;
  itemSkipped: (outcome: TransferOutcome) => void;
  itemFailed: (outcome: TransferOutcome) => void;
  progress: (overall: OverallProgress) => void;
  allComplete: (summary: TransferSummary) => void;
  cancelled: () => void;
}

// 전체 진행률 (작업 단위)
export interface OverallProgress {
  totalItems: number;
  completedItems: number;
  skippedItems: number;
  failedItems: number;
  finishedItems: number;
}

export const DEFAULT_CONCURRENCY = 4;

/**
 * 드라이버 파일 전송 엔진
 *
 * 고정 크기 워커 풀(p-queue)로 작업을 실행한다. 제출은 FIFO지만 완료 순서는 보장하지 않으며,
 * 결과는 작업 제출 순서대로 돌려준다. 한 작업의 실패는 다른 작업을 멈추지 않는다.
 */
export class DownloadManager extends EventEmitter<DownloadManagerEvents> {
  private queue: PQueue = new PQueue({ concurrency: DEFAULT_CONCURRENCY });
  private controller = new AbortController();
  private pathLocks: Map<string, Promise<TransferOutcome>> = new Map();
  private writing: Set<string> = new Set();
  private isRunning = false;
  private isCancelled = false;
  private progress: OverallProgress = emptyProgress(0);

  constructor(private readonly downloader: DriverFileDownloader) {
    super();
  }

  /**
   * 작업 목록 실행
   * outcomes[i]는 항상 tasks[i]의 결과다.
   */
  async run(tasks: DownloadTask[], options: TransferOptions): Promise<TransferSummary> {
    if (this.isRunning) {
      throw new Error('다운로드가 이미 진행 중입니다');
    }
    const concurrency = validateConcurrency(options.concurrency ?? DEFAULT_CONCURRENCY);

    this.queue = new PQueue({ concurrency });
    this.controller = new AbortController();
    this.isRunning = true;
    this.isCancelled = false;
    this.progress = emptyProgress(tasks.length);

    try {
      // 출력/카테고리 디렉토리는 작업 시작 전에 모두 생성
      await fs.ensureDir(options.outputPath);
      for (const dir of new Set(tasks.map((task) => task.destDir))) {
        await fs.ensureDir(dir);
      }

      logger.info('다운로드 시작', {
        itemCount: tasks.length,
        outputPath: options.outputPath,
        concurrency,
      });

      const outcomes = await Promise.all(
        tasks.map((task) => {
          const onProgress = options.onFileProgress;
          const onBytes: ByteProgressCallback | undefined = onProgress
            ? (downloaded, total) => onProgress(task, downloaded, total)
            : undefined;
          return this.queue.add(() => this.runTask(task, onBytes));
        })
      );

      const summary = summarize(outcomes, options.outputPath);
      if (this.isCancelled) {
        this.emit('cancelled');
      } else {
        this.emit('allComplete', summary);
      }

      logger.info('다운로드 완료', {
        completed: summary.completed,
        skipped: summary.skipped,
        failed: summary.failed,
      });
      return summary;
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * 다운로드 취소
   * 진행 중인 요청을 중단하고 쓰다 만 파일을 즉시 삭제한다. 대기 중인 작업은 'cancelled'로 실패 처리된다.
   */
  cancelDownload(): void {
    if (this.isCancelled) return;
    this.isCancelled = true;
    this.controller.abort();

    for (const filePath of this.writing) {
      try {
        fs.removeSync(filePath);
      } catch (error) {
        logger.warn('중단된 파일 삭제 실패', { filePath, error: describeError(error) });
      }
    }

    logger.info('다운로드 취소', { inFlight: this.writing.size });
  }

  /**
   * 현재 진행률
   */
  getOverallProgress(): OverallProgress {
    return { ...this.progress };
  }

  /**
   * 마지막 실행이 취소되었는지 여부
   */
  get cancelled(): boolean {
    return this.isCancelled;
  }

  private async runTask(task: DownloadTask, onProgress?: ByteProgressCallback): Promise<TransferOutcome> {
    let outcome: TransferOutcome;
    try {
      outcome = await this.executeTask(task, onProgress);
    } catch (error) {
      // 이벤트 리스너 예외 등 전송 밖의 오류도 이 작업의 실패로만 남긴다
      const reason = describeError(error);
      logger.warn('드라이버 파일 작업 실패', { title: task.driverTitle, url: task.file.url, reason });
      outcome = { status: 'failed', task, filePath: destinationOf(task), reason };
    }

    try {
      this.record(outcome);
    } catch (error) {
      logger.warn('진행 이벤트 처리 실패', { taskId: task.id, error: describeError(error) });
    }
    return outcome;
  }

  private async executeTask(task: DownloadTask, onProgress?: ByteProgressCallback): Promise<TransferOutcome> {
    const filePath = destinationOf(task);
    if (!filePath) {
      return { status: 'failed', task, filePath, reason: `파일명을 알 수 없는 URL입니다: ${task.file.url}` };
    }

    // 같은 경로를 쓰는 작업은 앞 작업이 끝난 뒤 존재 여부를 다시 본다 (경로당 쓰기는 하나)
    const previous = this.pathLocks.get(filePath);
    const current = this.claimPath(task, filePath, previous, onProgress);
    this.pathLocks.set(filePath, current);
    try {
      return await current;
    } finally {
      if (this.pathLocks.get(filePath) === current) {
        this.pathLocks.delete(filePath);
      }
    }
  }

  private async claimPath(
    task: DownloadTask,
    filePath: string,
    previous: Promise<TransferOutcome> | undefined,
    onProgress?: ByteProgressCallback
  ): Promise<TransferOutcome> {
    if (previous) {
      // 앞 작업의 오류는 그 작업의 결과로 이미 기록된다
      await previous.catch(() => undefined);
    }
    if (this.isCancelled) {
      return { status: 'failed', task, filePath, reason: 'cancelled' };
    }
    if (await fs.pathExists(filePath)) {
      return { status: 'skipped', task, filePath, reason: 'already-exists' };
    }

    this.writing.add(filePath);
    try {
      return await this.transfer(task, filePath, onProgress);
    } finally {
      this.writing.delete(filePath);
    }
  }

  private async transfer(
    task: DownloadTask,
    filePath: string,
    onProgress?: ByteProgressCallback
  ): Promise<TransferOutcome> {
    this.emit('itemStart', task);
    try {
      const bytes = await this.downloader.download(task.file.url, filePath, {
        signal: this.controller.signal,
        onProgress,
      });
      return { status: 'completed', task, filePath, bytes };
    } catch (error) {
      const reason = this.isCancelled ? 'cancelled' : describeError(error);
      logger.warn('드라이버 파일 다운로드 실패', {
        title: task.driverTitle,
        url: task.file.url,
        reason,
      });
      return { status: 'failed', task, filePath, reason };
    }
  }

  private record(outcome: TransferOutcome): void {
    this.progress.finishedItems++;
    switch (outcome.status) {
      case 'completed':
        this.progress.completedItems++;
        this.emit('itemComplete', outcome);
        break;
      case 'skipped':
        this.progress.skippedItems++;
        this.emit('itemSkipped', outcome);
        break;
      case 'failed':
        this.progress.failedItems++;
        this.emit('itemFailed', outcome);
        break;
    }
    this.emit('progress', this.getOverallProgress());
  }
}

/**
 * 작업의 저장 경로, URL에서 파일명을 얻지 못하면 빈 문자열
 */
function destinationOf(task: DownloadTask): string {
  try {
    return path.join(task.destDir, filenameFromUrl(task.file.url));
  } catch {
    return '';
  }
}

function emptyProgress(totalItems: number): OverallProgress {
  return { totalItems, completedItems: 0, skippedItems: 0, failedItems: 0, finishedItems: 0 };
}

/**
 * 결과 목록을 요약
 */
export function summarize(outcomes: TransferOutcome[], outputPath: string): TransferSummary {
  return {
    completed: outcomes.filter((o) => o.status === 'completed').length,
    skipped: outcomes.filter((o) => o.status === 'skipped').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
    outputPath,
    outcomes,
  };
}

/**
 * HTTP 설정으로 전송 엔진 생성
 * 실행마다 설정이 다를 수 있으므로 싱글톤으로 두지 않는다.
 */
export function createDownloadManager(clientConfig: ClientConfig): DownloadManager {
  return new DownloadManager(new DriverFileDownloader(new AxiosStreamSource(clientConfig)));
}
