import cliProgress from 'cli-progress';
import chalk from 'chalk';
import { runBulkDownload } from '../../core/workflows';
import type { OverallProgress } from '../../core/downloadManager';
import type { TransferOutcome } from '../../types';
import {
  createSession,
  exitWithError,
  parseWorkers,
  printHeader,
  printProduct,
  printWarnings,
  resolveOutputPath,
} from '../session';

// 다운로드 옵션
export interface DownloadOptions {
  output?: string;
  categories?: string[];
  workers?: string;
}

/**
 * download 명령어 핸들러
 */
export async function downloadCommand(serialNumber: string, options: DownloadOptions): Promise<void> {
  printHeader();

  try {
    const session = createSession('download', serialNumber);
    const concurrency = parseWorkers(options.workers, session.config.concurrentDownloads);
    const outputPath = resolveOutputPath(serialNumber, options.output);

    console.log(chalk.cyan(`\n시리얼 번호 조회 중: ${serialNumber}`));

    const progressBar = new cliProgress.SingleBar(
      {
        clearOnComplete: false,
        hideCursor: true,
        format: ' {bar} | {value}/{total} 파일 | {percentage}% | {filename}',
      },
      cliProgress.Presets.shades_classic
    );
    const failures: TransferOutcome[] = [];

    session.manager.on('progress', (overall: OverallProgress) => {
      progressBar.update(overall.finishedItems);
    });
    session.manager.on('itemComplete', (outcome) => {
      progressBar.update({ filename: outcome.task.driverTitle.slice(0, 40) });
    });
    session.manager.on('itemFailed', (outcome) => {
      failures.push(outcome);
    });

    const result = await runBulkDownload(
      session.resolver,
      session.manager,
      { serialNumber, outputPath, categories: options.categories, concurrency },
      {
        onProductResolved: printProduct,
        onDriversListed: (drivers, warnings) => {
          printWarnings(warnings);
          console.log(chalk.green(`✓ 드라이버 ${drivers.length}개 발견`));
        },
        onFiltered: (drivers, categories) => {
          console.log(chalk.cyan(`카테고리 필터 (${categories.join(', ')}): 드라이버 ${drivers.length}개`));
        },
        onManifestWritten: (manifestPath) => {
          console.log(chalk.gray(`매니페스트 저장: ${manifestPath}`));
        },
        onTasksReady: (tasks) => {
          console.log(chalk.cyan(`\n출력 경로: ${outputPath}`));
          console.log(chalk.cyan(`동시 다운로드: ${concurrency}개`));
          console.log(chalk.cyan(`파일 ${tasks.length}개 다운로드 시작\n`));
          progressBar.start(tasks.length, 0, { filename: '' });
        },
      }
    );

    progressBar.stop();

    if (!result.manifestPath) {
      console.log(chalk.red('✗ 다운로드할 드라이버가 없습니다'));
      return;
    }

    for (const outcome of failures) {
      if (outcome.status === 'failed') {
        console.log(chalk.red(`✗ 실패: ${outcome.filePath || outcome.task.file.url} - ${outcome.reason}`));
      }
    }

    const { summary } = result;
    console.log(chalk.green('\n✓ 다운로드 완료!'));
    console.log(chalk.gray(`  받음: ${summary.completed}`));
    console.log(chalk.gray(`  건너뜀 (이미 있음): ${summary.skipped}`));
    console.log(summary.failed > 0 ? chalk.red(`  실패: ${summary.failed}`) : chalk.gray('  실패: 0'));
    console.log(chalk.gray(`  위치: ${summary.outputPath}`));
  } catch (error) {
    exitWithError(error);
  }
}
