import { Logger } from './logger.js';
import { AppError } from '../types/errors.js';

export class ErrorHandler {
  static handle(error: unknown): void {
    if (error instanceof AppError) {
      Logger.error(error.message, {
        name: error.name,
        statusCode: error.statusCode,
        isOperational: error.isOperational,
        context: error.context,
      });

      // Operational errors are reported, the CLI still exits non-zero
      process.exitCode = 1;
      if (!error.isOperational) {
        process.exit(1);
      }
    } else if (error instanceof Error) {
      Logger.error(`Unexpected error: ${error.message}`, {
        name: error.name,
        stack: error.stack,
      });
      process.exit(1);
    } else {
      Logger.error('Unknown error occurred', { error });
      process.exit(1);
    }
  }

  static handleAsync<A extends unknown[]>(
    fn: (...args: A) => Promise<void>
  ): (...args: A) => Promise<void> {
    return (...args: A) => fn(...args).catch(ErrorHandler.handle);
  }

  static setupGlobalHandlers(): void {
    process.on('uncaughtException', (error) => {
      Logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      Logger.error('Unhandled Rejection:', { reason });
      process.exit(1);
    });

    process.on('SIGTERM', () => {
      Logger.info('SIGTERM received, shutting down');
      process.exit(0);
    });

    process.on('SIGINT', () => {
      Logger.info('SIGINT received, shutting down');
      process.exit(0);
    });
  }
}
