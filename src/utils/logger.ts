import winston from 'winston';
import { config } from '../config/index.js';
import type { LogLevel } from '../types/index.js';

export class Logger {
  private static instance: winston.Logger | undefined;

  static getInstance(): winston.Logger {
    if (!Logger.instance) {
      Logger.instance = winston.createLogger({
        level: config.logging.level,
        format: winston.format.combine(
          winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss',
          }),
          winston.format.errors({ stack: true })
        ),
        transports: [
          new winston.transports.Console({
            format: winston.format.combine(
              winston.format.colorize(),
              winston.format.printf(({ timestamp, level, message, ...meta }) => {
                const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
                return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
              })
            ),
          }),
        ],
      });
    }

    return Logger.instance;
  }

  static info(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().info(message, meta);
  }

  static warn(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().warn(message, meta);
  }

  static error(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().error(message, meta);
  }

  static debug(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().debug(message, meta);
  }

  static setLevel(level: LogLevel): void {
    Logger.getInstance().level = level;
  }
}
