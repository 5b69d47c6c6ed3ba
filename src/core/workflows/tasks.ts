import * as path from 'path';
import type { DownloadTask, DriverRecord, SccmPackage } from '../../types';
import { sanitizeCategory } from '../shared/filename-utils';

/**
 * 드라이버 목록을 카테고리별 다운로드 작업으로 변환
 * 대상 디렉토리: <outputPath>/<카테고리>
 */
export function buildDownloadTasks(drivers: DriverRecord[], outputPath: string): DownloadTask[] {
  const tasks: DownloadTask[] = [];

  for (const driver of drivers) {
    const destDir = path.join(outputPath, sanitizeCategory(driver.category));
    for (const file of driver.files) {
      tasks.push({ id: `task-${tasks.length + 1}`, file, destDir, driverTitle: driver.title });
    }
  }

  return tasks;
}

/**
 * SCCM 패키지를 한 디렉토리로 받는 작업으로 변환
 */
export function buildSccmTasks(packages: SccmPackage[], sccmDir: string): DownloadTask[] {
  const tasks: DownloadTask[] = [];

  for (const pkg of packages) {
    for (const file of pkg.files) {
      tasks.push({ id: `sccm-${tasks.length + 1}`, file, destDir: sccmDir, driverTitle: pkg.title });
    }
  }

  return tasks;
}
