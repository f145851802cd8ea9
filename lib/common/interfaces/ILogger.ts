/**
 * Custom logger interface.
 */
export default interface ILogger {
  /**
   * Logs informational data.
   */
  info (data: unknown): void;

  /**
   * Logs warning.
   */
  warn (data: unknown): void;

  /**
   * Logs error.
   */
  error (data: unknown): void;
}
