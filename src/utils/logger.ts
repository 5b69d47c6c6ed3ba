import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager } from '../core/config';

const isDev = process.env.NODE_ENV === 'development';
const isTest = process.env.NODE_ENV === 'test';

// 실행 단위 문맥 (명령, 시리얼 번호)
export interface RunContext {
  command: string;
  serial: string;
}

type LogMeta = Record<string, unknown>;

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, command, serial, ...meta }) => {
    const run = command ? ` [${command} ${serial}]` : '';
    let line = `[${timestamp}] [${level.toUpperCase()}]${run} ${message}`;
    if (Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(meta)}`;
    }
    return stack ? `${line}\n${stack}` : line;
  })
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ level, message, command: _command, serial: _serial, ...meta }) =>
    Object.keys(meta).length > 0 ? `${level}: ${message} ${JSON.stringify(meta)}` : `${level}: ${message}`
  )
);

/**
 * 드라이버 다운로더 로거
 *
 * 초기화 전에는 경고 이상만 콘솔(stderr)로 보낸다. CLI가 initialize()를 부르면
 * 설정 디렉토리의 logs/ 아래에 실행 로그와 오류 로그를 날짜별로 남기고,
 * setRunContext()로 정한 명령과 시리얼 번호를 모든 줄에 붙인다.
 */
export class DriverLogger {
  private context: RunContext | null = null;
  private initialized = false;

  constructor(
    private logger: winston.Logger = winston.createLogger({
      level: 'warn',
      silent: isTest,
      transports: [new winston.transports.Console({ format: consoleFormat, stderrLevels: ['error', 'warn'] })],
    })
  ) {}

  /**
   * 파일 로그 시작. 레벨은 설정의 logLevel (개발 모드는 debug)
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const configManager = getConfigManager();
    await configManager.ensureDirectories();
    const logsDir = configManager.getLogsDir();

    const runLog = new DailyRotateFile({
      dirname: logsDir,
      filename: 'lenovo-drivers-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '10m',
      maxFiles: '14d',
      format: fileFormat,
    });
    const errorLog = new DailyRotateFile({
      dirname: logsDir,
      filename: 'errors-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxFiles: '30d',
      level: 'error',
      format: fileFormat,
    });
    const transports = isDev
      ? [runLog, errorLog, new winston.transports.Console({ format: consoleFormat })]
      : [runLog, errorLog];

    this.logger = winston.createLogger({
      level: isDev ? 'debug' : configManager.getConfig().logLevel,
      silent: isTest,
      transports,
    });
    this.initialized = true;
    this.debug('로그 파일 기록 시작', { logsDir });
  }

  /**
   * 이후 모든 로그에 붙일 명령/시리얼 번호
   */
  setRunContext(context: RunContext): void {
    this.context = context;
  }

  error(message: string, meta?: LogMeta): void {
    this.logger.error(message, this.withContext(meta));
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, this.withContext(meta));
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, this.withContext(meta));
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, this.withContext(meta));
  }

  /**
   * 명령을 끝낸 오류 (DriverToolError면 code 포함)
   */
  logError(error: Error, context?: string): void {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    this.error(context ? `${context}: ${error.message}` : error.message, {
      name: error.name,
      ...(code ? { code } : {}),
      stack: error.stack,
    });
  }

  private withContext(meta?: LogMeta): LogMeta {
    return this.context ? { ...this.context, ...meta } : { ...meta };
  }
}

const logger = new DriverLogger();

export default logger;
