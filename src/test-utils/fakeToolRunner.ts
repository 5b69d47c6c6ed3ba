/**
 * 테스트용 외부 도구 실행기
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type { ToolRunResult, ToolRunner } from '../core/extractor/toolRunner';

export interface Invocation {
  command: string;
  args: readonly string[];
  timeoutMs: number;
}

export type ToolBehavior = (args: readonly string[]) => ToolRunResult;

export const success: ToolRunResult = { outcome: 'success', exitCode: 0, stderr: '' };
export const failure = (stderr = 'Can not open the file as archive'): ToolRunResult => ({
  outcome: 'failure',
  exitCode: 2,
  stderr,
});

/**
 * 가짜 도구 실행기
 * 설치된 도구 목록과 도구별 동작(파일 생성 등)을 미리 정한다.
 */
export class FakeToolRunner implements ToolRunner {
  readonly invocations: Invocation[] = [];
  readonly lookups: string[][] = [];

  constructor(
    private readonly installed: string[],
    private readonly behaviors: Record<string, ToolBehavior> = {}
  ) {}

  async locate(candidates: readonly string[]): Promise<string | null> {
    this.lookups.push([...candidates]);
    return candidates.find((c) => this.installed.includes(c)) ?? null;
  }

  async run(command: string, args: readonly string[], timeoutMs: number): Promise<ToolRunResult> {
    this.invocations.push({ command, args, timeoutMs });
    const behavior = this.behaviors[command];
    return behavior ? behavior(args) : failure();
  }
}

/** 도구 인자에서 출력 디렉토리 (-o<dir> 또는 -d <dir>) */
export const outputDirArg = (args: readonly string[]): string => {
  const flag = args.find((a) => a.startsWith('-o'));
  if (flag) return flag.slice(2);
  return args[args.indexOf('-d') + 1];
};

export const writeFiles = (dir: string, files: Record<string, string>): void => {
  for (const [name, content] of Object.entries(files)) {
    fs.outputFileSync(path.join(dir, name), content);
  }
};
