import { ChildProcess, spawn } from 'child_process';
import { describeError } from '../errors';
import logger from '../../utils/logger';

export type ToolRunOutcome = 'success' | 'failure' | 'timeout';

export interface ToolRunResult {
  outcome: ToolRunOutcome;
  /** 프로세스를 띄우지 못했거나 시간 초과로 종료되면 null */
  exitCode: number | null;
  stderr: string;
}

/**
 * 외부 압축 해제 도구 실행기
 */
export interface ToolRunner {
  /** 후보 중 처음으로 사용 가능한 명령 이름, 없으면 null */
  locate(candidates: readonly string[]): Promise<string | null>;
  run(command: string, args: readonly string[], timeoutMs: number): Promise<ToolRunResult>;
}

const AVAILABILITY_TIMEOUT_MS = 5000;
const MAX_STDERR_LENGTH = 4096;

/**
 * child_process.spawn 기반 실행기
 * 도구 존재 여부는 한 번만 확인하고 캐시한다.
 */
export class ProcessToolRunner implements ToolRunner {
  private availability: Map<string, Promise<boolean>> = new Map();

  async locate(candidates: readonly string[]): Promise<string | null> {
    for (const command of candidates) {
      if (await this.isAvailable(command)) {
        return command;
      }
    }
    return null;
  }

  run(command: string, args: readonly string[], timeoutMs: number): Promise<ToolRunResult> {
    return new Promise((resolve) => {
      let stderr = '';
      let settled = false;

      const settle = (result: ToolRunResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        process.removeListener('exit', killOnExit);
        resolve(result);
      };

      logger.debug('외부 도구 실행', { command, args });
      // POSIX에서는 새 프로세스 그룹으로 띄워 자식이 만든 하위 프로세스까지 한 번에 종료한다
      const proc = spawn(command, args, {
        stdio: ['ignore', 'ignore', 'pipe'],
        detached: process.platform !== 'win32',
      });

      // 분리된 프로세스 그룹은 Ctrl+C를 받지 못하므로 CLI가 종료될 때 함께 정리한다
      const killOnExit = (): void => killProcessTree(proc);
      process.once('exit', killOnExit);

      proc.stderr?.on('data', (data: Buffer) => {
        if (stderr.length < MAX_STDERR_LENGTH) {
          stderr = (stderr + data.toString()).slice(0, MAX_STDERR_LENGTH);
        }
      });

      // 'close'는 stderr를 물려받은 하위 프로세스가 끝날 때까지 오지 않으므로 타이머에서 바로 끝낸다
      const timer = setTimeout(() => {
        killProcessTree(proc);
        proc.stderr?.destroy();
        logger.warn('외부 도구 시간 초과', { command, timeoutMs });
        settle({ outcome: 'timeout', exitCode: null, stderr });
      }, timeoutMs);

      proc.on('error', (error) => {
        settle({ outcome: 'failure', exitCode: null, stderr: error.message });
      });

      proc.on('close', (code) => {
        settle({ outcome: code === 0 ? 'success' : 'failure', exitCode: code, stderr });
      });
    });
  }

  private isAvailable(command: string): Promise<boolean> {
    let cached = this.availability.get(command);
    if (!cached) {
      cached = checkAvailable(command);
      this.availability.set(command, cached);
    }
    return cached;
  }
}

/**
 * 인자 없이 실행해 본다. 종료 코드와 상관없이 실행되면 사용 가능, ENOENT면 없음
 */
function checkAvailable(command: string): Promise<boolean> {
  return new Promise((resolve) => {
    const proc = spawn(command, [], { stdio: 'ignore', detached: process.platform !== 'win32' });
    // 입력을 기다리며 멈춘 도구도 실행은 된 것이다
    const timer = setTimeout(() => {
      killProcessTree(proc);
      resolve(true);
    }, AVAILABILITY_TIMEOUT_MS);

    proc.on('close', () => {
      clearTimeout(timer);
      resolve(true);
    });
    proc.on('error', () => {
      clearTimeout(timer);
      resolve(false);
    });
  });
}

/**
 * 프로세스와 그 하위 프로세스를 SIGKILL로 종료
 */
function killProcessTree(proc: ChildProcess): void {
  if (process.platform !== 'win32' && proc.pid !== undefined) {
    try {
      process.kill(-proc.pid, 'SIGKILL');
      return;
    } catch (error) {
      logger.debug('프로세스 그룹 종료 실패, 단일 프로세스만 종료', { pid: proc.pid, error: describeError(error) });
    }
  }
  proc.kill('SIGKILL');
}
