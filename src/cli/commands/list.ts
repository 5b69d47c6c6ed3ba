import chalk from 'chalk';
import Table from 'cli-table3';
import { CatalogResolver } from '../../core/resolver/catalogResolver';
import { summarizeCategories } from '../../core/selection';
import { createSession, exitWithError, printHeader, printProduct, printWarnings } from '../session';

/**
 * list 명령어 핸들러: 카테고리별 파일 수
 */
export async function listCommand(serialNumber: string): Promise<void> {
  printHeader();

  try {
    const { resolver } = createSession('list', serialNumber);
    const product = await resolver.resolve(serialNumber);
    printProduct(product);

    const { drivers, warnings } = await resolver.listDrivers(product);
    printWarnings(warnings);

    if (drivers.length === 0) {
      console.log(chalk.red('✗ 드라이버를 찾을 수 없습니다'));
      return;
    }

    const table = new Table({
      head: [chalk.cyan('카테고리'), chalk.cyan('드라이버'), chalk.cyan('파일')],
      colWidths: [40, 12, 10],
    });

    for (const summary of summarizeCategories(drivers)) {
      table.push([summary.category, String(summary.drivers), String(summary.files)]);
    }

    console.log(chalk.cyan('\n사용 가능한 카테고리:\n'));
    console.log(table.toString());
    console.log(chalk.gray(`\n다운로드 예: lenovo-drivers download ${CatalogResolver.normalizeIdentifier(serialNumber)} -c BIOS Audio`));
  } catch (error) {
    exitWithError(error);
  }
}

/**
 * info 명령어 핸들러: 제품 원본 레코드 출력
 */
export async function infoCommand(serialNumber: string): Promise<void> {
  printHeader();

  try {
    const { resolver } = createSession('info', serialNumber);
    const product = await resolver.resolve(serialNumber);

    console.log(chalk.cyan('\n제품 정보:'));
    console.log(JSON.stringify(product.raw, null, 2));
  } catch (error) {
    exitWithError(error);
  }
}
