import type { DriverRecord, SccmPackage } from '../../types';
import { urlHasExtension } from '../shared/filename-utils';

/** SCCM 배포용 패키지를 식별하는 제목 표식 */
export const SCCM_TITLE_MARKER = 'sccm';

/** SCCM 드라이버 팩 실행 파일 확장자 */
export const SCCM_PACKAGE_EXTENSION = '.exe';

/**
 * SCCM 드라이버 팩만 추출
 *
 * 제목에 'sccm'이 들어간 레코드(대소문자 무시)를 고르고, 파일은 .exe만 남긴다.
 * .exe가 하나도 없는 레코드는 제외. 순서는 카탈로그 순서를 따른다.
 */
export function getSccmPackages(drivers: DriverRecord[]): SccmPackage[] {
  const packages: SccmPackage[] = [];

  for (const driver of drivers) {
    if (!driver.title.toLowerCase().includes(SCCM_TITLE_MARKER)) continue;

    const files = driver.files.filter((file) => urlHasExtension(file.url, SCCM_PACKAGE_EXTENSION));
    if (files.length === 0) continue;

    packages.push({ title: driver.title, category: driver.category, files });
  }

  return packages;
}
