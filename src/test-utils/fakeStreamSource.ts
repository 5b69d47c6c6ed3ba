/**
 * 테스트용 스트림 소스
 * 네트워크 없이 URL별로 미리 정한 응답을 돌려준다.
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import type { StreamResponse, StreamSource } from '../core/downloaders/driverDownloader';

export type FakeResponse =
  | { kind: 'body'; data: Buffer }
  | { kind: 'http-error'; status: number }
  | { kind: 'broken'; partial: Buffer; message: string };

export const body = (text: string): FakeResponse => ({ kind: 'body', data: Buffer.from(text) });

export class FakeStreamSource implements StreamSource {
  readonly opened: string[] = [];
  private responses: Map<string, FakeResponse> = new Map();

  respond(url: string, response: FakeResponse): this {
    this.responses.set(url, response);
    return this;
  }

  async open(url: string, signal: AbortSignal): Promise<StreamResponse> {
    this.opened.push(url);
    if (signal.aborted) {
      throw new Error('aborted');
    }

    const response = this.responses.get(url);
    if (!response) {
      throw new Error('Request failed with status code 404');
    }

    switch (response.kind) {
      case 'body':
        return { stream: Readable.from([response.data]), totalBytes: response.data.length };
      case 'http-error':
        throw new Error(`Request failed with status code ${response.status}`);
      case 'broken': {
        const { partial, message } = response;
        const stream = new Readable({
          read() {
            this.push(partial);
            this.destroy(new Error(message));
          },
        });
        return { stream, totalBytes: partial.length * 4 };
      }
    }
  }
}

/**
 * 테스트별 임시 디렉토리
 */
export function createTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}
