export interface Logger {
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  dryRun(message: string): void;
}

export function createConsoleLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    step: (message) => console.log(`${prefix} ==> ${message}`),
    info: (message) => console.log(`${prefix} ${message}`),
    success: (message) => console.log(`${prefix} ok: ${message}`),
    warn: (message) => console.error(`${prefix} warning: ${message}`),
    error: (message) => console.error(`${prefix} error: ${message}`),
    dryRun: (message) => console.log(`${prefix} [dry-run] ${message}`)
  };
}

export const silentLogger: Logger = {
  step: () => undefined,
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  dryRun: () => undefined
};
