#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import logger from '../utils/logger';
import { cancelActiveDownload, exitWithError, interruptActivePrompt } from './session';
import type { DownloadOptions } from './commands/download';
import type { SccmOptions } from './commands/sccm';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

program
  .name('lenovo-drivers')
  .description(chalk.cyan('Lenovo 드라이버 다운로더 - 시리얼 번호로 드라이버와 SCCM 드라이버 팩 다운로드'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// download 명령어
program
  .command('download')
  .description('드라이버 전체 또는 카테고리별 다운로드')
  .argument('<serial>', '기기 시리얼 번호')
  .option('-o, --output <path>', '출력 경로 (기본: ./drivers_<시리얼>)')
  .option('-c, --categories <names...>', '다운로드할 카테고리 (예: BIOS Audio Chipset)')
  .option('-w, --workers <num>', '동시 다운로드 수 (기본: 설정값 4)')
  .action(async (serial: string, options: DownloadOptions) => {
    const { downloadCommand } = await import('./commands/download');
    await downloadCommand(serial, options);
  });

// sccm 명령어
program
  .command('sccm')
  .description('SCCM 드라이버 팩 다운로드 및 압축 해제 (배포/OOBE용 .inf 포함)')
  .argument('<serial>', '기기 시리얼 번호')
  .option('-o, --output <path>', '출력 경로 (기본: ./drivers_<시리얼>)')
  .option('-p, --packages <numbers...>', '패키지 번호 (예: -p 1 3 5). 없으면 대화형으로 선택')
  .option('--no-extract', '압축 해제하지 않음')
  .action(async (serial: string, options: SccmOptions) => {
    const { sccmCommand } = await import('./commands/sccm');
    await sccmCommand(serial, options);
  });

// list 명령어
program
  .command('list')
  .description('카테고리별 드라이버 수 표시')
  .argument('<serial>', '기기 시리얼 번호')
  .action(async (serial: string) => {
    const { listCommand } = await import('./commands/list');
    await listCommand(serial);
  });

// info 명령어
program
  .command('info')
  .description('제품 정보 표시')
  .argument('<serial>', '기기 시리얼 번호')
  .action(async (serial: string) => {
    const { infoCommand } = await import('./commands/list');
    await infoCommand(serial);
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key?: string) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key: string, value: string) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (['commander.help', 'commander.helpDisplayed', 'commander.version'].includes(err.code)) {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// Ctrl+C: 패키지 선택 중이면 선택만 취소, 아니면 진행 중인 전송을 멈추고 쓰다 만 파일을 지운 뒤 130으로 종료
process.on('SIGINT', () => {
  if (interruptActivePrompt()) {
    return;
  }
  cancelActiveDownload();
  console.log(chalk.yellow('\n✗ 사용자가 중단했습니다'));
  process.exit(130);
});

async function main(): Promise<void> {
  // 명령어가 없으면 도움말 표시
  if (process.argv.length <= 2) {
    console.log(chalk.cyan('\n  Lenovo 드라이버 다운로더\n'));
    console.log('  사용법: lenovo-drivers <명령어> <시리얼> [옵션]\n');
    console.log('  명령어:');
    console.log('    download    드라이버 다운로드');
    console.log('    sccm        SCCM 드라이버 팩 다운로드 및 압축 해제');
    console.log('    list        카테고리 목록');
    console.log('    info        제품 정보');
    console.log('    config      설정 관리');
    console.log('\n  예시:');
    console.log(chalk.gray('    lenovo-drivers download PF1234AB'));
    console.log(chalk.gray('    lenovo-drivers download PF1234AB -o ./my_drivers -c BIOS Audio'));
    console.log(chalk.gray('    lenovo-drivers download PF1234AB -w 8'));
    console.log(chalk.gray('    lenovo-drivers sccm PF1234AB'));
    console.log(chalk.gray('    lenovo-drivers sccm PF1234AB -p 1 3 5 --no-extract'));
    console.log(chalk.gray('    lenovo-drivers list PF1234AB'));
    console.log('\n  자세한 내용: lenovo-drivers --help\n');
    return;
  }

  await logger.initialize();
  await program.parseAsync(process.argv);
}

main().catch(exitWithError);
