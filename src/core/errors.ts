/**
 * 드라이버 다운로더 에러 분류
 *
 * 치명적인 것은 ProductNotFoundError와 ConfigurationError뿐이며,
 * 나머지는 작업/레코드 단위로 수집되어 요약에 반영된다.
 */

export type DriverErrorCode =
  | 'PRODUCT_NOT_FOUND'
  | 'CATALOG_FETCH_DEGRADED'
  | 'TRANSFER_FAILED'
  | 'EXTRACTION_FAILED'
  | 'INVALID_SELECTION'
  | 'CONFIGURATION';

export class DriverToolError extends Error {
  readonly code: DriverErrorCode;

  constructor(code: DriverErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 모든 조회 전략 실패 */
export class ProductNotFoundError extends DriverToolError {
  readonly identifier: string;

  constructor(identifier: string) {
    super('PRODUCT_NOT_FOUND', `시리얼 번호에 해당하는 제품을 찾을 수 없습니다: ${identifier}`);
    this.identifier = identifier;
  }
}

/** 목록 API가 실패했지만 대체 경로로 계속 진행 */
export class CatalogFetchDegradedError extends DriverToolError {
  readonly endpoint: string;

  constructor(endpoint: string, message: string) {
    super('CATALOG_FETCH_DEGRADED', message);
    this.endpoint = endpoint;
  }
}

/** 파일 단위 전송 실패 */
export class TransferFailedError extends DriverToolError {
  readonly url: string;
  readonly filePath: string;

  constructor(url: string, filePath: string, cause: string) {
    super('TRANSFER_FAILED', cause);
    this.url = url;
    this.filePath = filePath;
  }
}

/** 아카이브 단위 압축 해제 실패 */
export class ExtractionFailedError extends DriverToolError {
  readonly archivePath: string;
  readonly hints: string[];

  constructor(archivePath: string, message: string, hints: string[] = []) {
    super('EXTRACTION_FAILED', message);
    this.archivePath = archivePath;
    this.hints = hints;
  }
}

/** 잘못된 패키지 선택 입력 */
export class InvalidSelectionError extends DriverToolError {
  readonly token: string;

  constructor(token: string, message: string) {
    super('INVALID_SELECTION', message);
    this.token = token;
  }
}

/** 복구 불가능한 설정 오류 (예: 동시 다운로드 수 0) */
export class ConfigurationError extends DriverToolError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

/**
 * unknown 에러에서 사람이 읽을 수 있는 메시지 추출
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
