import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import { errorMessage } from '@droidtap/shared';

function defaultLogDir(): string {
  if (os.platform() === 'win32') {
    const programData = process.env.PROGRAMDATA || 'C:\\ProgramData';
    return path.join(programData, 'droidtap', 'logs');
  }
  return path.join(os.homedir(), '.droidtap', 'logs');
}

/**
 * Builds the daemon logger: console plus daily-rotated main and error logs.
 * Without an explicit directory, logs go under the user's home.
 */
export function createWinstonLogger(logDirOverride?: string): winston.Logger {
  let logDir = logDirOverride || defaultLogDir();

  if (!fs.existsSync(logDir)) {
    try {
      fs.mkdirSync(logDir, { recursive: true });
    } catch (error) {
      console.error(
        `Failed to create log directory ${logDir}: ${errorMessage(error)}`,
      );
      logDir = os.tmpdir();
    }
  }

  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, context, stack }) => {
      const contextStr = context ? `[${context}] ` : '';
      const stackStr = stack ? `\n${stack}` : '';
      return `[${timestamp}] [${level.toUpperCase()}] ${contextStr}${message}${stackStr}`;
    }),
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, context }) => {
      const contextStr = context ? `[${context}] ` : '';
      return `[${timestamp}] ${level} ${contextStr}${message}`;
    }),
  );

  const rotate = (name: string, level: string) =>
    new DailyRotateFile({
      filename: path.join(logDir, `${name}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '10m',
      maxFiles: '14d',
      format: logFormat,
      level,
    });

  return winston.createLogger({
    level: 'debug',
    transports: [
      new winston.transports.Console({ format: consoleFormat, level: 'debug' }),
      rotate('droidtapd', 'debug'),
      rotate('droidtapd-error', 'error'),
    ],
    exceptionHandlers: [
      new winston.transports.File({
        filename: path.join(logDir, 'droidtapd-exceptions.log'),
        format: logFormat,
      }),
    ],
    rejectionHandlers: [
      new winston.transports.File({
        filename: path.join(logDir, 'droidtapd-rejections.log'),
        format: logFormat,
      }),
    ],
  });
}
