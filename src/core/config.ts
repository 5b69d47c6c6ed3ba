import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import * as winston from 'winston';
import { ConfigurationError } from './errors';

// 설정 인터페이스 정의
export interface Config {
  // 다운로드 설정
  concurrentDownloads: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;

  // 압축 해제 설정
  extractTimeoutMs: number;
  outerExtractTimeoutMs: number;

  // 기타 설정
  baseUrl: string;
  logLevel: string;
}

// 기본 설정값
export const DEFAULT_CONFIG: Config = {
  concurrentDownloads: 4,
  requestTimeoutMs: 30000,
  downloadTimeoutMs: 60000,
  extractTimeoutMs: 600000,
  outerExtractTimeoutMs: 300000,
  baseUrl: 'https://pcsupport.lenovo.com/us/en',
  logLevel: 'info',
};

// 브라우저로 보이도록 하는 요청 헤더
const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'application/json, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.9',
  Referer: 'https://pcsupport.lenovo.com/',
  Origin: 'https://pcsupport.lenovo.com',
};

/**
 * HTTP 호출에 전달되는 불변 클라이언트 설정
 */
export interface ClientConfig {
  readonly baseUrl: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly requestTimeoutMs: number;
  readonly downloadTimeoutMs: number;
}

export function createClientConfig(config: Pick<Config, 'baseUrl' | 'requestTimeoutMs' | 'downloadTimeoutMs'> = DEFAULT_CONFIG): ClientConfig {
  return Object.freeze({
    baseUrl: config.baseUrl.replace(/\/+$/, ''),
    headers: Object.freeze({ ...BROWSER_HEADERS }),
    requestTimeoutMs: config.requestTimeoutMs,
    downloadTimeoutMs: config.downloadTimeoutMs,
  });
}

/**
 * 동시 다운로드 수 검증 (1 이상의 정수)
 */
export function validateConcurrency(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`동시 다운로드 수는 1 이상의 정수여야 합니다: ${value}`);
  }
  return value;
}

// 숫자형 설정 키 (set 시 숫자로 검증)
const NUMERIC_KEYS: ReadonlyArray<keyof Config> = [
  'concurrentDownloads',
  'requestTimeoutMs',
  'downloadTimeoutMs',
  'extractTimeoutMs',
  'outerExtractTimeoutMs',
];

/**
 * winston이 아는 로그 레벨인지 (npm 레벨: error, warn, info, http, verbose, debug, silly)
 */
export function isLogLevel(value: unknown): value is string {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(winston.config.npm.levels, value);
}

export function isConfigKey(key: string): key is keyof Config {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir?: string) {
    this.configDir =
      configDir ?? process.env.LENOVO_DRIVERS_HOME ?? path.join(os.homedir(), '.lenovo-drivers');
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정 디렉토리 경로를 반환합니다.
   */
  getConfigDir(): string {
    return this.configDir;
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 설정을 동기적으로 로드합니다. 파일이 없거나 깨졌으면 기본값을 사용합니다.
   */
  getConfig(): Config {
    const config: Config = { ...DEFAULT_CONFIG };
    const raw = this.readRaw();

    for (const key of Object.keys(raw)) {
      if (isConfigKey(key)) {
        this.assign(config, key, raw[key]);
      }
    }

    return config;
  }

  /**
   * 설정값을 동기적으로 설정합니다 (CLI용).
   */
  set(key: string, value: unknown): void {
    if (!isConfigKey(key)) {
      throw new ConfigurationError(`알 수 없는 설정 키입니다: ${key}`);
    }
    if (NUMERIC_KEYS.includes(key)) {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ConfigurationError(`'${key}' 값은 숫자여야 합니다`);
      }
      if (key === 'concurrentDownloads') {
        validateConcurrency(value);
      }
    } else if (typeof value !== 'string') {
      throw new ConfigurationError(`'${key}' 값은 문자열이어야 합니다`);
    } else if (key === 'logLevel' && !isLogLevel(value)) {
      throw new ConfigurationError(
        `알 수 없는 로그 레벨입니다: ${value} (${Object.keys(winston.config.npm.levels).join(', ')})`
      );
    }

    fs.ensureDirSync(this.configDir);
    const config = this.readRaw();
    config[key] = value;
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
  }

  /**
   * 설정을 동기적으로 초기화합니다 (CLI용).
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }

  private readRaw(): Record<string, unknown> {
    try {
      if (fs.pathExistsSync(this.configPath)) {
        const parsed: unknown = fs.readJsonSync(this.configPath);
        if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
          return Object.fromEntries(Object.entries(parsed));
        }
      }
    } catch {
      // 깨진 설정 파일은 기본값으로 대체
    }
    return {};
  }

  private assign(config: Config, key: keyof Config, value: unknown): void {
    switch (key) {
      case 'baseUrl':
        if (typeof value === 'string' && value) config[key] = value;
        break;
      case 'logLevel':
        if (isLogLevel(value)) config[key] = value;
        break;
      default:
        if (typeof value === 'number' && Number.isFinite(value) && value > 0) config[key] = value;
    }
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
