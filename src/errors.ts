export type HarnessStage =
  | 'resolve-browser'
  | 'start-server'
  | 'launch-browser'
  | 'find-tab'
  | 'connect'
  | 'run';

export interface HarnessErrorInfo {
  stage: HarnessStage;
  details?: Record<string, unknown>;
}

export class HarnessError extends Error {
  readonly stage: HarnessStage;
  readonly details?: Record<string, unknown>;

  constructor(message: string, info: HarnessErrorInfo, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'HarnessError';
    this.stage = info.stage;
    this.details = info.details;
  }
}

export class BrowserNotFoundError extends HarnessError {
  constructor(message = 'Unable to locate a Chrome install', details?: Record<string, unknown>) {
    super(message, { stage: 'resolve-browser', details });
    this.name = 'BrowserNotFoundError';
  }
}

export class LaunchFailedError extends HarnessError {
  readonly executablePath: string;

  constructor(executablePath: string, cause?: unknown) {
    super(`Failed to launch browser at ${executablePath}: ${describeError(cause)}`, {
      stage: 'launch-browser',
      details: { executablePath },
    }, cause);
    this.name = 'LaunchFailedError';
    this.executablePath = executablePath;
  }
}

export class ServerStartFailedError extends HarnessError {
  constructor(root: string, port: number, cause?: unknown) {
    super(`Static server could not bind port ${port} for ${root}: ${describeError(cause)}`, {
      stage: 'start-server',
      details: { root, port },
    }, cause);
    this.name = 'ServerStartFailedError';
  }
}

/** The DevTools HTTP endpoint is not listening yet. Expected right after launch. */
export class ConnectionRefusedError extends HarnessError {
  constructor(host: string, port: number, cause?: unknown) {
    super(`DevTools endpoint ${host}:${port} refused the connection`, {
      stage: 'find-tab',
      details: { host, port },
    }, cause);
    this.name = 'ConnectionRefusedError';
  }
}

export class TabNotFoundError extends HarnessError {
  constructor(host: string, port: number, retryForMs: number, lastError?: unknown) {
    const suffix = lastError === undefined ? '' : ` (last error: ${describeError(lastError)})`;
    super(`No matching tab on ${host}:${port} after ${retryForMs}ms${suffix}`, {
      stage: 'find-tab',
      details: { host, port, retryForMs },
    }, lastError);
    this.name = 'TabNotFoundError';
  }
}

export class ConnectionError extends HarnessError {
  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'connect' }, cause);
    this.name = 'ConnectionError';
  }
}

export class BrowserExitedError extends HarnessError {
  readonly exitCode: number | null;

  constructor(exitCode: number | null, signal: NodeJS.Signals | null) {
    const label = signal ? `signal ${signal}` : `code ${exitCode ?? 'unknown'}`;
    super(`Browser exited (${label}) before the tests finished`, {
      stage: 'run',
      details: { exitCode, signal },
    });
    this.name = 'BrowserExitedError';
    this.exitCode = exitCode;
  }
}

export function toHarnessError(error: unknown, stage: HarnessStage = 'run'): HarnessError {
  if (error instanceof HarnessError) {
    return error;
  }
  return new HarnessError(describeError(error), { stage }, error);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
