/**
 * Logger callback shared by pipeline components
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = (level: LogLevel, message: string, data?: Record<string, unknown>) => void;

export const silentLogger: Logger = () => {};

/**
 * Console logger prefixed with a scope tag; debug output only when LOG_LEVEL=debug
 */
export function createConsoleLogger(scope: string, level: string = process.env.LOG_LEVEL || 'info'): Logger {
  const debugEnabled = level === 'debug';

  return (logLevel, message, data) => {
    const line = `[${scope}] ${message}`;
    const args: unknown[] = data ? [line, data] : [line];

    switch (logLevel) {
      case 'error':
        console.error(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'debug':
        if (debugEnabled) console.debug(...args);
        break;
      default:
        console.log(...args);
    }
  };
}

/**
 * Mask a credential for log output
 */
export function maskSecret(secret: string | undefined): string {
  if (!secret) return 'None';
  return `${secret.slice(0, 6)}...`;
}
