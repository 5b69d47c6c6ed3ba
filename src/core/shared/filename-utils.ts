/**
 * 드라이버 파일명/디렉토리명 처리 유틸리티
 * 로컬 파일명은 항상 URL에서 유도하며, 벤더가 준 표시 이름은 사용하지 않습니다.
 */

/**
 * 카테고리 라벨에 섞인 경로 구분자
 */
const PATH_SEPARATORS = /[/\\]/g;

/**
 * URL의 마지막 경로 세그먼트를 퍼센트 디코딩하여 파일명으로 반환
 *
 * 쿼리 문자열과 프래그먼트는 무시합니다. 디코딩 결과에 경로 구분자가 생기면
 * '_'로 바꿔 대상 디렉토리 밖으로 나가지 않게 합니다.
 *
 * @example
 * filenameFromUrl('https://host/path/bios_1.2.exe?sig=abc') // 'bios_1.2.exe'
 * filenameFromUrl('https://host/a/Intel%20WLAN.exe') // 'Intel WLAN.exe'
 */
export function filenameFromUrl(url: string): string {
  const segment = lastPathSegment(url);
  const decoded = safeDecode(segment).replace(PATH_SEPARATORS, '_');

  if (!decoded || decoded === '.' || decoded === '..') {
    throw new Error(`URL에서 파일명을 추출할 수 없습니다: ${url}`);
  }
  return decoded;
}

/**
 * 카테고리 라벨을 단일 디렉토리명으로 변환 ('/', '\\' → '-')
 *
 * @example
 * sanitizeCategory('Audio/Video') // 'Audio-Video'
 */
export function sanitizeCategory(category: string): string {
  return category.replace(PATH_SEPARATORS, '-');
}

/**
 * URL 경로가 주어진 확장자로 끝나는지 (대소문자 무시, 쿼리 무시)
 */
export function urlHasExtension(url: string, extension: string): boolean {
  return lastPathSegment(url).toLowerCase().endsWith(extension.toLowerCase());
}

function lastPathSegment(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // 상대 경로 등 URL 파서가 거부하는 값
    pathname = url.split(/[?#]/)[0];
  }
  const segments = pathname.split('/');
  return segments[segments.length - 1];
}

// 잘못된 퍼센트 시퀀스는 원문 유지
function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
