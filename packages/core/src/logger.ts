/**
 * Logger interface shared by the engine's orchestration code. The CLI
 * supplies a chalk-backed implementation; tests use a silent one.
 */

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}
