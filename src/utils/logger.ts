export type Logger = (message: string) => void;

export interface LoggerOptions {
  verbose?: boolean;
}

/**
 * Scoped stderr logger for the CLI. Quiet loggers only pass warnings through,
 * which keeps stdout free for command output.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  return (message: string) => {
    if (options.verbose || message.startsWith('Warning:')) {
      console.error(`[${scope}] ${message}`);
    }
  };
}
