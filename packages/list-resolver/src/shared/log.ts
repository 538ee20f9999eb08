import { cyan, dim, green, red, yellow } from 'colorette';

export interface Logger {
  info(message: string): void;
  step(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Scoped stdout logger. Every level goes to stdout; colorette drops the
 * colors when stdout is not a TTY.
 */
export function createLogger(scope: string): Logger {
  const tag = dim(`[${scope}]`);
  const write = (line: string) => console.log(`${tag} ${line}`);

  return {
    info: (message) => write(message),
    step: (message) => write(cyan(message)),
    success: (message) => write(green(message)),
    warn: (message) => write(yellow(message)),
    error: (message) => write(red(message)),
  };
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === 'AbortError' || err.name === 'TimeoutError') return 'request timed out';
    return err.message || err.name;
  }
  return String(err);
}
