// Log sink shared by the session engine and conversation views

export type LogSink = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  debug?: (msg: string) => void;
};

export function createConsoleLog(options: { verbose?: boolean } = {}): LogSink {
  return {
    info: (msg) => console.log(`[chatline] ${msg}`),
    warn: (msg) => console.warn(`[chatline] ${msg}`),
    error: (msg) => console.error(`[chatline] ${msg}`),
    ...(options.verbose ? { debug: (msg: string) => console.debug(`[chatline] ${msg}`) } : {}),
  };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
