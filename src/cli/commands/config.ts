import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, isConfigKey } from '../../core/config';
import { describeError } from '../../core/errors';

const descriptions: Record<string, string> = {
  concurrentDownloads: '동시 다운로드 수',
  requestTimeoutMs: '카탈로그 요청 제한 시간 (ms)',
  downloadTimeoutMs: '파일 다운로드 제한 시간 (ms)',
  extractTimeoutMs: '압축 해제 제한 시간 (ms)',
  outerExtractTimeoutMs: '바깥 압축 해제 제한 시간 (ms)',
  baseUrl: '지원 사이트 주소',
  logLevel: '로그 레벨',
};

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = getConfigManager().getConfig();

  if (key) {
    if (isConfigKey(key)) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(config[key])));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  const configManager = getConfigManager();

  try {
    // 숫자로 읽히면 숫자, 아니면 문자열
    const parsedValue: string | number = value.trim() !== '' && !isNaN(Number(value)) ? Number(value) : value;

    configManager.set(key, parsedValue);
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(parsedValue)}`));
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${describeError(error)}`));
    process.exit(1);
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const configManager = getConfigManager();
  const config = configManager.getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [25, 40, 32],
  });

  for (const [key, value] of Object.entries(config)) {
    table.push([key, String(value), descriptions[key] || '-']);
  }

  console.log(chalk.cyan('\n설정 목록:\n'));
  console.log(table.toString());
  console.log(chalk.gray(`\n설정 파일 위치: ${configManager.getConfigDir()}`));
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  const configManager = getConfigManager();

  try {
    configManager.reset();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${describeError(error)}`));
    process.exit(1);
  }
}
