import 'dotenv/config';
import winston from 'winston';
import path from 'path';

// 日志级别配置
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

// 日志颜色配置
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'white'
};

winston.addColors(colors);

export type LogLevel = keyof typeof levels;

export interface LoggerOptions {
  level: string;
  file?: string;
  silent?: boolean;
}

// 控制台格式，元数据追加在消息之后
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, ...meta } = info;
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${extra}`;
  })
);

/**
 * 创建logger实例
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const fileTransports = options.file
    ? [
        new winston.transports.File({
          filename: path.resolve(options.file),
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json()
          )
        })
      ]
    : [];

  return winston.createLogger({
    level: options.level,
    levels,
    transports: [new winston.transports.Console({ format: consoleFormat }), ...fileTransports],
    silent: options.silent ?? false,
    exitOnError: false
  });
}

const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  file: process.env.LOG_FILE,
  silent: process.env.NODE_ENV === 'test'
});

export type LogMeta = Record<string, unknown>;

// 便捷方法
export const log = {
  error: (message: string, meta?: LogMeta) => logger.error(message, meta),
  warn: (message: string, meta?: LogMeta) => logger.warn(message, meta),
  info: (message: string, meta?: LogMeta) => logger.info(message, meta),
  debug: (message: string, meta?: LogMeta) => logger.debug(message, meta),
};
