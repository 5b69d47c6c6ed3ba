import cliProgress from 'cli-progress';
import chalk from 'chalk';
import * as path from 'path';
import { runSccmDownload } from '../../core/workflows';
import { PresetSelectionProvider } from '../../core/selection';
import { filenameFromUrl } from '../../core/shared/filename-utils';
import type { ExtractionResult } from '../../core/extractor/sccmExtractor';
import type { SccmPackage, SelectionProvider } from '../../types';
import {
  createInteractiveSelection,
  createSession,
  exitWithError,
  formatDeclaredSize,
  printHeader,
  printProduct,
  printWarnings,
  resolveOutputPath,
} from '../session';

// sccm 옵션
export interface SccmOptions {
  output?: string;
  packages?: string[];
  extract: boolean;
}

/**
 * sccm 명령어 핸들러
 */
export async function sccmCommand(serialNumber: string, options: SccmOptions): Promise<void> {
  printHeader();

  try {
    const session = createSession('sccm', serialNumber);
    const outputPath = resolveOutputPath(serialNumber, options.output);
    const selection: SelectionProvider = options.packages
      ? new PresetSelectionProvider(options.packages)
      : createInteractiveSelection();

    let bar: cliProgress.SingleBar | null = null;

    const result = await runSccmDownload(
      { catalog: session.resolver, manager: session.manager, extractor: session.extractor },
      { serialNumber, outputPath, selection, extract: options.extract },
      {
        onProductResolved: printProduct,
        onDriversListed: (_drivers, warnings) => printWarnings(warnings),
        onPackagesFound: printPackages,
        onPackagesSelected: (packages) => {
          console.log(chalk.green(`\n✓ 패키지 ${packages.length}개 선택:`));
          for (const pkg of packages) {
            console.log(`  • ${pkg.title}`);
          }
          console.log(chalk.cyan(`\n저장 위치: ${path.join(outputPath, 'SCCM')}`));
        },
        onFileStart: (task) => {
          const filename = displayFilename(task.file.url);
          console.log(chalk.cyan(`\n⬇ ${filename} 다운로드 중 (${formatDeclaredSize(task.file.size)})`));
          bar = new cliProgress.SingleBar(
            { hideCursor: true, format: ' {bar} | {percentage}% | {value}/{total} bytes' },
            cliProgress.Presets.shades_classic
          );
          bar.start(0, 0);
        },
        onFileProgress: (event) => {
          bar?.setTotal(event.totalBytes);
          bar?.update(event.downloadedBytes);
        },
        onFileDone: (outcome) => {
          bar?.stop();
          bar = null;
          const filename = outcome.filePath ? path.basename(outcome.filePath) : displayFilename(outcome.task.file.url);
          switch (outcome.status) {
            case 'completed':
              console.log(chalk.green(`  ✓ ${filename} 다운로드 완료`));
              break;
            case 'skipped':
              console.log(chalk.gray(`\n⏭ ${filename} 이미 있음, 건너뜀`));
              break;
            case 'failed':
              console.log(chalk.red(`  ✗ ${filename} 다운로드 실패: ${outcome.reason}`));
              break;
          }
        },
        onExtractStart: (archivePath) => {
          console.log(chalk.cyan(`\n🔧 ${path.basename(archivePath)} 압축 해제 중...`));
        },
        onExtractDone: printExtraction,
      }
    );

    if (result.status === 'no-packages') {
      console.log(chalk.red('✗ 이 기기에 해당하는 SCCM 패키지가 없습니다'));
      console.log(chalk.gray('  SCCM 패키지는 주로 ThinkPad/ThinkCentre 업무용 모델에 제공됩니다'));
      return;
    }
    if (result.status === 'cancelled') {
      console.log(chalk.yellow('✗ 다운로드가 취소되었습니다'));
      return;
    }
    if (result.status === 'interrupted') {
      console.log(chalk.yellow('\n✗ 다운로드가 중단되었습니다'));
      return;
    }

    console.log(chalk.green('\n✓ SCCM 패키지 다운로드 완료!'));
    console.log(chalk.gray(`  위치: ${result.sccmDir}`));

    if (result.extractions.length > 0) {
      console.log(chalk.cyan('\n압축 해제된 드라이버 폴더:'));
      for (const extraction of result.extractions) {
        console.log(`  • ${path.basename(extraction.targetDir)}/  (.inf 드라이버 파일 ${extraction.infCount}개)`);
      }
    }

    console.log(chalk.cyan('\n배포/OOBE 사용 방법:'));
    console.log('  • USB 설치: pnputil /add-driver <path>\\*.inf /subdirs');
    console.log('  • DISM 주입: DISM /Image:C:\\Mount /Add-Driver /Driver:<path> /Recurse');
  } catch (error) {
    exitWithError(error);
  }
}

function printPackages(packages: SccmPackage[]): void {
  console.log(chalk.cyan(`\nSCCM 패키지 ${packages.length}개 발견:`));
  packages.forEach((pkg, index) => {
    console.log(`  [${index + 1}] ${pkg.title}`);
    for (const file of pkg.files) {
      console.log(chalk.gray(`      - ${displayFilename(file.url)} (${formatDeclaredSize(file.size)})`));
    }
  });
}

function displayFilename(url: string): string {
  try {
    return filenameFromUrl(url);
  } catch {
    return url;
  }
}

function printExtraction(result: ExtractionResult): void {
  const folder = path.basename(result.targetDir);
  switch (result.status) {
    case 'skipped':
      console.log(chalk.gray(`  ⏭ ${folder}/ 이미 압축 해제됨, 건너뜀`));
      break;
    case 'extracted':
      console.log(chalk.green(`  ✓ ${result.message} (.inf ${result.infCount}개)`));
      break;
    case 'failed':
      console.log(chalk.yellow(`  ⚠ ${result.message}`));
      for (const hint of result.hints) {
        console.log(chalk.gray(`    💡 ${hint}`));
      }
      break;
  }
}
