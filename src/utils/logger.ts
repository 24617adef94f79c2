/**
 * forcegen 로거
 * stdout은 생성된 .bats 스크립트 전용이므로 콘솔 로그는 모두 stderr로 보냄
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager } from '../core/config';

const isDev = process.env.NODE_ENV === 'development';

const STDERR_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

type LogMeta = Record<string, unknown>;

/**
 * 로그 파일 한 줄 구성: [시각] [레벨] 메시지 {메타}, 스택은 다음 줄
 */
export function formatLogLine(
  timestamp: unknown,
  level: string,
  message: unknown,
  meta: LogMeta,
  stack?: unknown
): string {
  let line = `[${String(timestamp)}] [${level.toUpperCase()}] ${String(message)}`;
  if (Object.keys(meta).length > 0) {
    line += ` ${JSON.stringify(meta)}`;
  }
  if (stack) {
    line += `\n${String(stack)}`;
  }
  return line;
}

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) =>
    formatLogLine(timestamp, level, message, meta, stack)
  )
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${suffix}`;
  })
);

function stderrConsole(): winston.transports.ConsoleTransportInstance {
  return new winston.transports.Console({ format: consoleFormat, stderrLevels: STDERR_LEVELS });
}

class ForcegenLogger {
  // 초기화 전에는 콘솔만, 경고 이상
  private sink: winston.Logger = winston.createLogger({
    level: isDev ? 'debug' : 'warn',
    format: fileFormat,
    transports: [stderrConsole()],
  });
  private initialized = false;

  /**
   * 설정의 logLevel 적용 및 일자별 로그 파일 연결
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const configManager = getConfigManager();
    await configManager.ensureDirectories();
    const logsDir = configManager.getLogsDir();
    const { logLevel } = configManager.getConfig();

    this.sink = winston.createLogger({
      level: isDev ? 'debug' : logLevel,
      format: fileFormat,
      transports: [
        new DailyRotateFile({
          dirname: logsDir,
          filename: 'forcegen-%DATE%.log',
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: fileFormat,
        }),
        stderrConsole(),
      ],
    });

    this.initialized = true;
    this.debug('로거 초기화 완료', { logsDir });
  }

  error(message: string, meta?: LogMeta): void {
    this.sink.error(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.sink.info(message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.sink.debug(message, meta);
  }

  /**
   * 에러 객체 기록 (context가 있으면 메시지 앞에 붙임)
   */
  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }
}

const logger = new ForcegenLogger();

export default logger;
