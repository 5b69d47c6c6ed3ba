import * as fs from 'fs-extra';
import * as path from 'path';
import { DEFAULT_CONFIG } from '../config';
import { ExtractionFailedError, describeError } from '../errors';
import { ProcessToolRunner, ToolRunResult, ToolRunner } from './toolRunner';
import logger from '../../utils/logger';

export type ExtractionStatus = 'extracted' | 'skipped' | 'failed';

export interface ExtractionResult {
  status: ExtractionStatus;
  archivePath: string;
  targetDir: string;
  message: string;
  /** 압축 해제 후 대상 디렉토리 아래의 .inf 파일 수 */
  infCount: number;
  hints: string[];
}

export interface SccmExtractorOptions {
  platform?: NodeJS.Platform;
  runner?: ToolRunner;
  /** 안쪽 단계와 네이티브 실행 제한 시간 */
  timeoutMs?: number;
  /** 7-Zip 바깥 단계 제한 시간 */
  outerTimeoutMs?: number;
}

export const SEVEN_ZIP_CANDIDATES = ['7z', '7zz', '7za'] as const;
export const INNER_PAYLOAD = '[0]';
export const EXTRACTION_ARTIFACTS = ['[0]', 'CERTIFICATE', '[1]', '[2]'] as const;

const SEVEN_ZIP_INSTALL_HINT = '7-Zip을 설치하세요: brew install sevenzip (Linux: p7zip-full)';
const INNER_TOOLS_INSTALL_HINT = '추가 도구를 설치하세요: brew install cabextract innoextract';

interface Toolchain {
  sevenZip: string | null;
  cabextract: string | null;
  innoextract: string | null;
}

interface InnerAttempt {
  command: string | null;
  args: string[];
}

/**
 * SCCM 드라이버 팩(.exe 자체 압축 해제 파일) 압축 해제
 *
 * Windows에서는 패키지 자체의 추출 옵션을, 그 외 환경에서는 7-Zip으로 바깥 껍데기를 풀고
 * 안쪽 [0] 페이로드를 cabextract → innoextract → 7-Zip 순으로 시도한다.
 */
export class SccmExtractor {
  private readonly platform: NodeJS.Platform;
  private readonly runner: ToolRunner;
  private readonly timeoutMs: number;
  private readonly outerTimeoutMs: number;
  private toolchain: Promise<Toolchain> | null = null;

  constructor(options: SccmExtractorOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.runner = options.runner ?? new ProcessToolRunner();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONFIG.extractTimeoutMs;
    this.outerTimeoutMs = options.outerTimeoutMs ?? DEFAULT_CONFIG.outerExtractTimeoutMs;
  }

  async extract(archivePath: string, targetDir: string): Promise<ExtractionResult> {
    if (await isNonEmptyDirectory(targetDir)) {
      return this.result('skipped', archivePath, targetDir, '이미 압축 해제됨');
    }

    logger.info('SCCM 패키지 압축 해제 시작', { archivePath, targetDir, platform: this.platform });

    try {
      await fs.ensureDir(targetDir);
      const message =
        this.platform === 'win32'
          ? await this.extractNative(archivePath, targetDir)
          : await this.extractWithToolchain(archivePath, targetDir);
      const result = await this.result('extracted', archivePath, targetDir, message);
      logger.info('SCCM 패키지 압축 해제 완료', { archivePath, infCount: result.infCount });
      return result;
    } catch (error) {
      // 어떤 오류든 이 패키지의 실패로 끝내고 다음 패키지는 계속 푼다
      const message = describeError(error);
      const hints = error instanceof ExtractionFailedError ? error.hints : [];
      logger.warn('SCCM 패키지 압축 해제 실패', { archivePath, reason: message });
      return this.failure(archivePath, targetDir, message, hints);
    }
  }

  /**
   * 패키지 자체 추출 (Windows)
   * 종료 코드가 0이 아니어도 대상 디렉토리에 뭔가 생겼으면 성공으로 본다.
   */
  private async extractNative(archivePath: string, targetDir: string): Promise<string> {
    const attempts = [['/VERYSILENT', `/DIR=${targetDir}`], [`/extract:${targetDir}`]];

    for (const args of attempts) {
      const run = await this.runner.run(archivePath, args, this.timeoutMs);
      if (run.outcome === 'timeout') {
        throw new ExtractionFailedError(archivePath, '자체 압축 해제 시간 초과');
      }
      if (run.outcome === 'success' || (await isNonEmptyDirectory(targetDir))) {
        return `${path.basename(targetDir)}에 압축 해제됨`;
      }
    }

    throw new ExtractionFailedError(archivePath, '자체 압축 해제 실패');
  }

  private async extractWithToolchain(archivePath: string, targetDir: string): Promise<string> {
    const tools = await this.discoverTools();
    if (!tools.sevenZip) {
      throw new ExtractionFailedError(archivePath, '7-Zip을 찾을 수 없습니다', [SEVEN_ZIP_INSTALL_HINT]);
    }

    // 1단계: 바깥 껍데기
    const outer = await this.runner.run(
      tools.sevenZip,
      ['x', '-y', `-o${targetDir}`, archivePath],
      this.outerTimeoutMs
    );
    if (outer.outcome !== 'success') {
      throw new ExtractionFailedError(archivePath, `바깥 압축 해제 실패: ${describeRun(outer)}`);
    }

    const payload = path.join(targetDir, INNER_PAYLOAD);
    if (!(await fs.pathExists(payload)) || (await countInfFiles(targetDir)) > 0) {
      return `${path.basename(targetDir)}에 압축 해제됨`;
    }

    // 2단계: 안쪽 페이로드, 처음 성공한 도구에서 멈춘다
    const attempts: InnerAttempt[] = [
      { command: tools.cabextract, args: ['-d', targetDir, payload] },
      { command: tools.innoextract, args: ['-d', targetDir, payload] },
      { command: tools.sevenZip, args: ['x', '-y', `-o${targetDir}`, '-t*', payload] },
    ];

    for (const attempt of attempts) {
      if (!attempt.command) continue;

      const inner = await this.runner.run(attempt.command, attempt.args, this.timeoutMs);
      if (inner.outcome === 'success') {
        await removeArtifacts(targetDir);
        return `${path.basename(targetDir)}에 드라이버 압축 해제됨 (${attempt.command})`;
      }
      logger.debug('안쪽 페이로드 압축 해제 실패', { command: attempt.command, reason: describeRun(inner) });
    }

    throw new ExtractionFailedError(archivePath, '안쪽 페이로드를 자동으로 풀 수 없습니다', [
      `Windows에서 실행: ${path.basename(archivePath)} /VERYSILENT /DIR=C:\\Drivers`,
      INNER_TOOLS_INSTALL_HINT,
    ]);
  }

  private discoverTools(): Promise<Toolchain> {
    if (!this.toolchain) {
      this.toolchain = (async () => ({
        sevenZip: await this.runner.locate(SEVEN_ZIP_CANDIDATES),
        cabextract: await this.runner.locate(['cabextract']),
        innoextract: await this.runner.locate(['innoextract']),
      }))();
    }
    return this.toolchain;
  }

  /**
   * 실패 결과. 대상 경로를 읽을 수 없으면 .inf 수는 0
   */
  private async failure(
    archivePath: string,
    targetDir: string,
    message: string,
    hints: string[]
  ): Promise<ExtractionResult> {
    let infCount = 0;
    try {
      infCount = await countInfFiles(targetDir);
    } catch (error) {
      logger.debug('.inf 파일 수를 셀 수 없음', { targetDir, error: describeError(error) });
    }
    return { status: 'failed', archivePath, targetDir, message, infCount, hints };
  }

  private async result(
    status: ExtractionStatus,
    archivePath: string,
    targetDir: string,
    message: string,
    hints: string[] = []
  ): Promise<ExtractionResult> {
    return { status, archivePath, targetDir, message, infCount: await countInfFiles(targetDir), hints };
  }
}

function describeRun(run: ToolRunResult): string {
  if (run.outcome === 'timeout') {
    return '시간 초과';
  }
  const detail = run.stderr.trim().slice(0, 100);
  return detail || `종료 코드 ${run.exitCode ?? '알 수 없음'}`;
}

async function isNonEmptyDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.readdir(dir)).length > 0;
  } catch {
    return false;
  }
}

/**
 * 디렉토리 아래 .inf 파일 수 (대소문자 무시, 재귀)
 */
export async function countInfFiles(dir: string): Promise<number> {
  if (!(await fs.pathExists(dir))) {
    return 0;
  }

  let count = 0;
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      count += await countInfFiles(entryPath);
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.inf')) {
      count++;
    }
  }
  return count;
}

async function removeArtifacts(targetDir: string): Promise<void> {
  for (const artifact of EXTRACTION_ARTIFACTS) {
    const artifactPath = path.join(targetDir, artifact);
    try {
      await fs.remove(artifactPath);
    } catch (error) {
      logger.warn('압축 해제 부산물 삭제 실패', { artifactPath, error: describeError(error) });
    }
  }
}

/**
 * 압축 해제 후 사용할 대상 디렉토리 (<SCCM 디렉토리>/<파일명 확장자 제외>)
 */
export function extractionTargetFor(archivePath: string): string {
  return path.join(path.dirname(archivePath), path.basename(archivePath, path.extname(archivePath)));
}
