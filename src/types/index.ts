// ============================================
// 카탈로그 관련 타입
// ============================================

/** 시리얼 번호로 조회한 제품 정보 */
export interface ProductDescriptor {
  /** 벤더 제품 ID (예: LAPTOPS-AND-NETBOOKS/THINKPAD-T-SERIES-LAPTOPS/...) */
  readonly id: string;
  /** 표시용 제품명 */
  readonly name: string;
  /** 벤더가 돌려준 원본 레코드 (매니페스트 기록용) */
  readonly raw: Readonly<Record<string, unknown>>;
}

/** 드라이버 파일 항목 */
export interface FileEntry {
  /** 다운로드 URL (비어 있지 않음) */
  url: string;
  /** 선언된 크기. 숫자 0은 알 수 없음, 문자열은 벤더 표기 그대로 */
  size: number | string;
  /** 표시용 이름. 로컬 파일명으로 쓰지 않는다 */
  name: string;
  sha256?: string;
}

/** 드라이버 레코드 */
export interface DriverRecord {
  title: string;
  category: string;
  version: string;
  /** 유닉스 타임스탬프 문자열, 없으면 빈 문자열 */
  releaseDate: string;
  files: FileEntry[];
}

// ============================================
// 다운로드 관련 타입
// ============================================

/** 다운로드 작업 */
export interface DownloadTask {
  id: string;
  file: FileEntry;
  destDir: string;
  /** 로그용 드라이버 제목 */
  driverTitle: string;
}

/** 작업별 전송 결과 (URL에서 파일명을 얻지 못한 실패는 filePath가 빈 문자열) */
export type TransferOutcome =
  | { status: 'completed'; task: DownloadTask; filePath: string; bytes: number }
  | { status: 'skipped'; task: DownloadTask; filePath: string; reason: 'already-exists' }
  | { status: 'failed'; task: DownloadTask; filePath: string; reason: string };

/** 바이트 단위 진행 이벤트 */
export interface DownloadProgressEvent {
  itemId: string;
  /** 0-100, 전체 크기를 모르면 0 */
  progress: number;
  downloadedBytes: number;
  totalBytes: number;
}

/** 전송 요약 */
export interface TransferSummary {
  completed: number;
  skipped: number;
  failed: number;
  outputPath: string;
  outcomes: TransferOutcome[];
}

// ============================================
// 선택 관련 타입
// ============================================

/** SCCM 패키지 (파일이 .exe로 좁혀진 드라이버 레코드) */
export interface SccmPackage {
  title: string;
  category: string;
  files: FileEntry[];
}

/** 선택 결과 (인덱스는 0-based) */
export type SelectionResult =
  | { kind: 'selected'; indices: number[] }
  | { kind: 'cancelled' };

/** 패키지 선택 제공자 */
export interface SelectionProvider {
  select(packages: SccmPackage[]): Promise<SelectionResult>;
}

// ============================================
// 매니페스트
// ============================================

/** 실행마다 한 번 기록되는 드라이버 매니페스트 */
export interface DriverManifest {
  serial_number: string;
  product: Readonly<Record<string, unknown>>;
  drivers: DriverRecord[];
  download_date: string;
}
