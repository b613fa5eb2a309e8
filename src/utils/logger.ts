import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

const LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVELS.some((level) => level === value);
}

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${stack}`;
    }
    return log;
  })
);

// 콘솔용 컬러 포맷
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `[${timestamp}] ${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

// stdout은 실패 목록 전용이므로 콘솔 로그는 전부 stderr로
const createConsoleTransport = (): winston.transport =>
  new winston.transports.Console({
    format: consoleFormat,
    stderrLevels: [...LEVELS],
  });

function levelFromEnv(): LogLevel | undefined {
  const value = process.env.LOG_LEVEL;
  return isLogLevel(value) ? value : undefined;
}

export interface LoggerOptions {
  /** 로그 파일 디렉토리 */
  logsDir: string;
  level?: LogLevel;
}

class Logger {
  private logger: winston.Logger;
  private initialized = false;

  constructor() {
    // 기본 로거 생성 (초기화 전 사용)
    this.logger = winston.createLogger({
      level: levelFromEnv() ?? 'info',
      format: logFormat,
      transports: [createConsoleTransport()],
    });
  }

  /**
   * 파일 로테이션을 포함해 로거를 초기화합니다.
   * LOG_LEVEL 환경 변수가 설정 값보다 우선합니다.
   */
  initialize(options: LoggerOptions): void {
    if (this.initialized) return;

    const fileTransport = new DailyRotateFile({
      dirname: options.logsDir,
      filename: 'app-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      format: logFormat,
    });

    // 에러 전용 파일 트랜스포트
    const errorFileTransport = new DailyRotateFile({
      dirname: options.logsDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      format: logFormat,
    });

    this.logger = winston.createLogger({
      level: levelFromEnv() ?? options.level ?? 'info',
      format: logFormat,
      transports: [createConsoleTransport(), fileTransport, errorFileTransport],
    });

    this.initialized = true;
    this.debug('로거 초기화 완료', { logsDir: options.logsDir });
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }
}

// 싱글톤 인스턴스
const logger = new Logger();

export default logger;
