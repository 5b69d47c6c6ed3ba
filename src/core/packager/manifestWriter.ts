/**
 * 드라이버 매니페스트 기록
 * 실행마다 카탈로그 조회 직후, 전송 전에 한 번만 기록한다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type { DriverManifest, DriverRecord, ProductDescriptor } from '../../types';
import logger from '../../utils/logger';

export const MANIFEST_FILENAME = 'driver_manifest.json';

export interface ManifestInput {
  serialNumber: string;
  product: ProductDescriptor;
  /** 필터 적용 전 전체 목록 */
  drivers: DriverRecord[];
  date?: Date;
}

/**
 * 로컬 시간 'YYYY-MM-DD HH:mm:ss'
 */
export function formatManifestDate(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function createManifest(input: ManifestInput): DriverManifest {
  return {
    serial_number: input.serialNumber,
    product: input.product.raw,
    drivers: input.drivers,
    download_date: formatManifestDate(input.date ?? new Date()),
  };
}

/**
 * 출력 디렉토리에 매니페스트 기록
 * @returns 기록한 파일 경로
 */
export async function writeManifest(outputDir: string, input: ManifestInput): Promise<string> {
  const manifestPath = path.join(outputDir, MANIFEST_FILENAME);

  await fs.ensureDir(outputDir);
  await fs.writeJson(manifestPath, createManifest(input), { spaces: 2 });

  logger.info('매니페스트 저장', { manifestPath, drivers: input.drivers.length });
  return manifestPath;
}
