import type { DriverRecord } from '../../types';

/**
 * 카테고리 허용 목록으로 드라이버 필터링 (대소문자 무시, 완전 일치)
 * 필터가 없거나 비어 있으면 전체를 반환하고, 일치하는 것이 없으면 빈 배열을 반환한다.
 */
export function filterByCategories(drivers: DriverRecord[], categories?: string[]): DriverRecord[] {
  if (!categories || categories.length === 0) {
    return drivers;
  }

  const allowed = new Set(categories.map((category) => category.toLowerCase()));
  return drivers.filter((driver) => allowed.has(driver.category.toLowerCase()));
}

// 카테고리별 파일 수
export interface CategorySummary {
  category: string;
  drivers: number;
  files: number;
}

/**
 * 카테고리별 드라이버/파일 수 집계 (카테고리명 정렬)
 */
export function summarizeCategories(drivers: DriverRecord[]): CategorySummary[] {
  const summary = new Map<string, CategorySummary>();

  for (const driver of drivers) {
    const entry = summary.get(driver.category) ?? { category: driver.category, drivers: 0, files: 0 };
    entry.drivers += 1;
    entry.files += driver.files.length;
    summary.set(driver.category, entry);
  }

  return Array.from(summary.values()).sort((a, b) =>
    a.category < b.category ? -1 : a.category > b.category ? 1 : 0
  );
}
