export interface CoreLogger {
  debug(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
}

export const silentLogger: CoreLogger = {
  debug() {},
  warn() {},
};
