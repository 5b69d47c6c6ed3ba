import * as readline from 'readline';
import type { SccmPackage, SelectionProvider, SelectionResult } from '../../types';
import { InvalidSelectionError } from '../errors';
import { parseSelectionInput, validatePresetIndices } from './indexSelection';

/**
 * 명령행에서 미리 받은 1-based 번호로 선택 (문자열이면 입력 그대로 검증)
 */
export class PresetSelectionProvider implements SelectionProvider {
  constructor(private readonly indices: ReadonlyArray<number | string>) {}

  async select(packages: SccmPackage[]): Promise<SelectionResult> {
    return { kind: 'selected', indices: validatePresetIndices(this.indices, packages.length) };
  }
}

export interface InteractiveSelectionOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * 터미널 프롬프트로 선택
 * 잘못된 입력은 경고 후 다시 묻고, 입력이 끝나거나(EOF) interrupt()가 불리면 취소로 처리한다.
 */
export class InteractiveSelectionProvider implements SelectionProvider {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private prompt: readline.Interface | null = null;

  constructor(options: InteractiveSelectionOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async select(packages: SccmPackage[]): Promise<SelectionResult> {
    const rl = readline.createInterface({ input: this.input, terminal: false });
    const lines = rl[Symbol.asyncIterator]();
    this.prompt = rl;

    this.output.write('\n다운로드할 패키지를 선택하세요:\n');
    this.output.write('  • 쉼표로 구분한 번호 (예: 1,3,5)\n');
    this.output.write("  • 'all' 입력 시 전체\n");
    this.output.write("  • 'none' 입력 시 취소\n");

    try {
      for (;;) {
        this.output.write('\n  선택: ');
        const next = await lines.next();
        if (next.done) {
          return { kind: 'cancelled' };
        }

        try {
          return parseSelectionInput(next.value, packages.length);
        } catch (error) {
          if (!(error instanceof InvalidSelectionError)) throw error;
          this.output.write(`  ⚠ ${error.message}\n`);
          this.output.write("  쉼표로 구분한 번호, 'all', 'none' 중 하나를 입력하세요.\n");
        }
      }
    } finally {
      this.prompt = null;
      rl.close();
    }
  }

  /**
   * 열려 있는 프롬프트를 닫아 선택을 취소 (Ctrl+C)
   * @returns 프롬프트가 열려 있었으면 true
   */
  interrupt(): boolean {
    if (!this.prompt) return false;
    this.output.write('\n');
    this.prompt.close();
    return true;
  }
}
