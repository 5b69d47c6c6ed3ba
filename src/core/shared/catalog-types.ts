// Lenovo 지원 API 드라이버 목록 응답
// 항목은 검증되지 않은 원시 JSON이며 catalog-normalize.ts가 필드를 읽는다.
//   v4 (api/v4/downloads/drivers): { Title, Category: { Name }, Version, Date: { Unix }, Files: [{ Name, URL, Size, SHA256 }] }
//   v2 (api/v2/products/{id}/downloads): { Name, Category, Version, DownloadUrl, FileName, Size }

/**
 * 드라이버 목록 응답 변형
 */
export type DriverListResponse =
  | { variant: 'v4'; items: unknown[] }
  | { variant: 'v2'; items: unknown[] };

export type DriverListVariant = DriverListResponse['variant'];
