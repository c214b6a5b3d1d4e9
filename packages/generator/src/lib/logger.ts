export interface GeneratorLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export const consoleLogger: GeneratorLogger = {
  debug: (message, data) => console.debug(`[DEBUG] ${message}`, data ?? ""),
  info: (message, data) => console.info(`[INFO] ${message}`, data ?? ""),
  warn: (message, data) => console.warn(`[WARN] ${message}`, data ?? ""),
  error: (message, data) => console.error(`[ERROR] ${message}`, data ?? "")
};

export const silentLogger: GeneratorLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
