import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios from 'axios';
import * as fs from 'fs-extra';
import * as path from 'path';
import { Readable } from 'stream';
import { AxiosStreamSource, DriverFileDownloader } from './driverDownloader';
import { createClientConfig } from '../config';
import { TransferFailedError } from '../errors';
import { FakeStreamSource, body, createTempDir } from '../../test-utils/fakeStreamSource';

vi.mock('axios');

const mockedAxios = vi.mocked(axios, true);

describe('AxiosStreamSource', () => {
  const mockGet = vi.fn();

  beforeEach(() => {
    mockGet.mockReset();
    mockedAxios.create.mockReturnValue({ get: mockGet } as never);
  });

  it('다운로드 타임아웃과 브라우저 헤더로 클라이언트 생성', () => {
    const config = createClientConfig();
    new AxiosStreamSource(config);

    expect(mockedAxios.create).toHaveBeenCalledWith({
      timeout: config.downloadTimeoutMs,
      headers: { ...config.headers },
    });
  });

  it('스트림과 content-length 반환', async () => {
    const stream = Readable.from([Buffer.from('abc')]);
    mockGet.mockResolvedValue({ data: stream, headers: { 'content-length': '3' } });
    const signal = new AbortController().signal;

    const response = await new AxiosStreamSource(createClientConfig()).open('https://host/a.exe', signal);

    expect(response).toEqual({ stream, totalBytes: 3 });
    expect(mockGet).toHaveBeenCalledWith('https://host/a.exe', { responseType: 'stream', signal });
  });

  it('content-length가 없으면 0', async () => {
    mockGet.mockResolvedValue({ data: Readable.from([]), headers: {} });

    const response = await new AxiosStreamSource(createClientConfig()).open(
      'https://host/a.exe',
      new AbortController().signal
    );

    expect(response.totalBytes).toBe(0);
  });
});

describe('DriverFileDownloader', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir('driver-file-test');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('스트림 내용을 파일로 저장하고 바이트 수 반환', async () => {
    const source = new FakeStreamSource().respond('https://host/a.exe', body('driver-payload'));
    const filePath = path.join(dir, 'a.exe');

    const bytes = await new DriverFileDownloader(source).download('https://host/a.exe', filePath);

    expect(bytes).toBe(14);
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('driver-payload');
  });

  it('HTTP 오류는 TransferFailedError로 변환', async () => {
    const source = new FakeStreamSource().respond('https://host/a.exe', { kind: 'http-error', status: 503 });
    const filePath = path.join(dir, 'a.exe');

    const error = await new DriverFileDownloader(source)
      .download('https://host/a.exe', filePath)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransferFailedError);
    expect(error).toMatchObject({
      url: 'https://host/a.exe',
      filePath,
      message: 'Request failed with status code 503',
    });
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it('중간에 끊긴 전송은 부분 파일을 남기지 않음', async () => {
    const source = new FakeStreamSource().respond('https://host/a.exe', {
      kind: 'broken',
      partial: Buffer.from('half'),
      message: 'ECONNRESET',
    });
    const filePath = path.join(dir, 'a.exe');

    await expect(new DriverFileDownloader(source).download('https://host/a.exe', filePath)).rejects.toThrow(
      'ECONNRESET'
    );
    expect(fs.existsSync(filePath)).toBe(false);
  });
});
