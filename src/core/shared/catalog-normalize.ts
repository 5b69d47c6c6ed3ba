/**
 * 카탈로그 응답 정규화
 *
 * 변형(v4, v2)마다 정규화 함수가 하나씩 있고, 누락 필드는 아래 기본값을 쓴다.
 *   title: 'Unknown', category: 'Other', version: 'Unknown'(v4) / ''(v2),
 *   releaseDate: '', size: 0, name: ''(v4) / URL 마지막 세그먼트(v2)
 */

import type { DriverRecord, FileEntry, ProductDescriptor } from '../../types';
import type { DriverListResponse } from './catalog-types';

const PRODUCT_ID_PATTERN = /"productId":\s*"([^"]+)"/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return fallback;
}

function readSize(source: Record<string, unknown>, key: string): number | string {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return value;
  if (typeof value === 'string' && value.trim()) return value.trim();
  return 0;
}

function readArray(source: Record<string, unknown>, key: string): unknown[] {
  const value = source[key];
  return Array.isArray(value) ? value : [];
}

/**
 * 제품 조회 응답(배열)의 첫 항목을 ProductDescriptor로 변환
 * 배열이 아니거나 비어 있으면 null
 */
export function normalizeProductResponse(body: unknown, fallbackId: string): ProductDescriptor | null {
  if (!Array.isArray(body) || body.length === 0) {
    return null;
  }
  const first: unknown = body[0];
  if (!isRecord(first)) {
    return null;
  }

  return Object.freeze({
    id: readString(first, 'Id', '') || fallbackId,
    name: readString(first, 'Name', 'Unknown'),
    raw: Object.freeze({ ...first }),
  });
}

/**
 * HTML 제품 페이지에 박힌 productId 추출
 */
export function extractProductIdFromHtml(html: string): string | null {
  const match = html.match(PRODUCT_ID_PATTERN);
  return match ? match[1] : null;
}

/**
 * v4 응답에서 DownloadItems 컬렉션 추출 (body.DownloadItems → DownloadItems)
 */
export function extractV4Items(body: unknown): unknown[] {
  if (!isRecord(body)) return [];

  const nested = isRecord(body.body) ? readArray(body.body, 'DownloadItems') : [];
  if (nested.length > 0) return nested;

  return readArray(body, 'DownloadItems');
}

/**
 * v2 응답에서 Downloads 컬렉션 추출
 */
export function extractV2Items(body: unknown): unknown[] {
  return isRecord(body) ? readArray(body, 'Downloads') : [];
}

/**
 * v4 항목 정규화. 유효한 파일이 없으면 null
 */
export function normalizeV4Item(item: unknown): DriverRecord | null {
  if (!isRecord(item)) return null;

  const files: FileEntry[] = [];
  for (const raw of readArray(item, 'Files')) {
    if (!isRecord(raw)) continue;
    const url = readString(raw, 'URL', '').trim();
    if (!url) continue;

    const sha256 = readString(raw, 'SHA256', '');
    files.push({
      url,
      size: readSize(raw, 'Size'),
      name: readString(raw, 'Name', ''),
      ...(sha256 ? { sha256 } : {}),
    });
  }
  if (files.length === 0) return null;

  const category = isRecord(item.Category) ? readString(item.Category, 'Name', 'Other') : 'Other';
  const releaseDate = isRecord(item.Date) ? readString(item.Date, 'Unix', '') : '';

  return {
    title: readString(item, 'Title', 'Unknown'),
    category,
    version: readString(item, 'Version', 'Unknown'),
    releaseDate,
    files,
  };
}

/**
 * v2 항목 정규화. DownloadUrl이 없으면 null
 */
export function normalizeV2Item(item: unknown): DriverRecord | null {
  if (!isRecord(item)) return null;

  const url = readString(item, 'DownloadUrl', '').trim();
  if (!url) return null;

  const segments = url.split('?')[0].split('/');
  return {
    title: readString(item, 'Name', 'Unknown'),
    category: readString(item, 'Category', 'Other'),
    version: readString(item, 'Version', ''),
    releaseDate: '',
    files: [
      {
        url,
        size: readSize(item, 'Size'),
        name: readString(item, 'FileName', segments[segments.length - 1]),
      },
    ],
  };
}

/**
 * 응답 변형을 공통 DriverRecord 목록으로 정규화
 */
export function normalizeDriverList(response: DriverListResponse): DriverRecord[] {
  const normalize = response.variant === 'v4' ? normalizeV4Item : normalizeV2Item;
  const drivers: DriverRecord[] = [];

  for (const item of response.items) {
    const driver = normalize(item);
    if (driver) {
      drivers.push(driver);
    }
  }
  return drivers;
}
