import ILogger from './interfaces/ILogger';

/**
 * Console Logger.
 */
export default class ConsoleLogger implements ILogger {
  info (data: unknown): void {
    console.info(data);
  }

  warn (data: unknown): void {
    console.warn(data);
  }

  error (data: unknown): void {
    console.error(data);
  }
}
