export interface Logger {
  warn(message: string, ...meta: unknown[]): void;
}

export const consoleLogger: Logger = console;
