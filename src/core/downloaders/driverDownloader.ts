import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs-extra';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import type { ClientConfig } from '../config';
import { TransferFailedError, describeError } from '../errors';

/** 쓰기 버퍼 크기 (원격 파일 크기와 무관하게 메모리 사용 고정) */
export const WRITE_BUFFER_SIZE = 64 * 1024;

// 스트림 응답
export interface StreamResponse {
  stream: Readable;
  /** content-length, 모르면 0 */
  totalBytes: number;
}

/**
 * URL에서 바이트 스트림을 여는 소스
 * 2xx가 아니거나 전송 오류가 나면 reject해야 한다.
 */
export interface StreamSource {
  open(url: string, signal: AbortSignal): Promise<StreamResponse>;
}

/**
 * axios 스트림 응답 기반 소스
 */
export class AxiosStreamSource implements StreamSource {
  private client: AxiosInstance;

  constructor(clientConfig: ClientConfig) {
    this.client = axios.create({
      timeout: clientConfig.downloadTimeoutMs,
      headers: { ...clientConfig.headers },
    });
  }

  async open(url: string, signal: AbortSignal): Promise<StreamResponse> {
    const response = await this.client.get<Readable>(url, {
      responseType: 'stream',
      signal,
    });

    const totalBytes = parseInt(String(response.headers['content-length'] ?? '0'), 10);
    return { stream: response.data, totalBytes: Number.isFinite(totalBytes) ? totalBytes : 0 };
  }
}

export type ByteProgressCallback = (downloadedBytes: number, totalBytes: number) => void;

export interface FileDownloadOptions {
  signal?: AbortSignal;
  onProgress?: ByteProgressCallback;
}

/**
 * 드라이버 파일 하나를 스트리밍으로 저장
 * 실패하면 쓰다 만 파일을 지우고 TransferFailedError를 던진다.
 */
export class DriverFileDownloader {
  constructor(private readonly source: StreamSource) {}

  /**
   * @returns 기록한 바이트 수
   */
  async download(url: string, filePath: string, options: FileDownloadOptions = {}): Promise<number> {
    const signal = options.signal ?? new AbortController().signal;
    let downloadedBytes = 0;
    let writer: fs.WriteStream | undefined;

    try {
      const { stream, totalBytes } = await this.source.open(url, signal);

      const counter = new Transform({
        transform(chunk: Buffer, _encoding, callback) {
          downloadedBytes += chunk.length;
          try {
            options.onProgress?.(downloadedBytes, totalBytes);
          } catch (error) {
            callback(error instanceof Error ? error : new Error(String(error)));
            return;
          }
          callback(null, chunk);
        },
      });

      writer = fs.createWriteStream(filePath, { highWaterMark: WRITE_BUFFER_SIZE });
      await pipeline(stream, counter, writer, { signal });

      return downloadedBytes;
    } catch (error) {
      // 파일이 닫힌 뒤에 지워야 늦게 열린 핸들이 빈 파일을 다시 만들지 않는다
      if (writer && !writer.closed) {
        const pending = writer;
        await new Promise<void>((resolve) => pending.once('close', () => resolve()));
      }
      await fs.remove(filePath);
      throw new TransferFailedError(url, filePath, describeError(error));
    }
  }
}
