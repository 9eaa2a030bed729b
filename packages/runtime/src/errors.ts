export class WheelhouseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WheelhouseError";
  }
}

export class ResolutionError extends WheelhouseError {
  readonly path?: string;
  readonly searched: readonly string[];

  constructor(message: string, params: { path?: string; searched?: readonly string[] } = {}) {
    super(message);
    this.name = "ResolutionError";
    this.path = params.path;
    this.searched = params.searched ?? [];
  }
}

export class UnsupportedPlatformError extends WheelhouseError {
  readonly platform: string;
  readonly arch: string;

  constructor(platform: string, arch: string) {
    super(`Unsupported platform: ${platform}-${arch}`);
    this.name = "UnsupportedPlatformError";
    this.platform = platform;
    this.arch = arch;
  }
}

export class ConfigError extends WheelhouseError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid wheelhouse configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class StartTimeoutError extends WheelhouseError {
  readonly timeoutMs: number;
  readonly output: string;

  constructor(timeoutMs: number, output: string) {
    super(`Timed out after ${timeoutMs}ms waiting for the driver to announce its endpoint`);
    this.name = "StartTimeoutError";
    this.timeoutMs = timeoutMs;
    this.output = output;
  }
}

export class ProcessCrashedError extends WheelhouseError {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  /** Most recent driver output; starts with "[truncated]" when older text was dropped. */
  readonly output: string;

  constructor(params: {
    exitCode: number | null;
    signal?: NodeJS.Signals | null;
    output: string;
    cause?: unknown;
  }) {
    super(formatCrashMessage(params.exitCode, params.signal ?? null, params.output), {
      cause: params.cause,
    });
    this.name = "ProcessCrashedError";
    this.exitCode = params.exitCode;
    this.signal = params.signal ?? null;
    this.output = params.output;
  }
}

function formatCrashMessage(
  exitCode: number | null,
  signal: NodeJS.Signals | null,
  output: string
): string {
  const status =
    exitCode !== null
      ? `exit code ${exitCode}`
      : signal
        ? `signal ${signal}`
        : "no exit status";
  const trimmed = output.trim();
  return trimmed.length > 0
    ? `Driver process exited with ${status}: ${trimmed}`
    : `Driver process exited with ${status}`;
}

export class ConnectionError extends WheelhouseError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`Failed to connect to ${url}: ${describeCause(cause)}`, { cause });
    this.name = "ConnectionError";
    this.url = url;
  }
}

export class ConnectionClosedError extends WheelhouseError {
  readonly url: string;

  constructor(url: string) {
    super(`Connection to ${url} is closed`);
    this.name = "ConnectionClosedError";
    this.url = url;
  }
}

export class TimeoutError extends WheelhouseError {
  readonly method: string;
  readonly timeoutMs: number;

  constructor(method: string, timeoutMs: number) {
    super(`Command ${method} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.method = method;
    this.timeoutMs = timeoutMs;
  }
}

/** The driver answered a command with an error response. */
export class ProtocolError extends WheelhouseError {
  readonly code: string;
  readonly remoteMessage: string;
  readonly stacktrace?: string;
  readonly method?: string;

  constructor(params: { code: string; message: string; stacktrace?: string; method?: string }) {
    super(`${params.code}: ${params.message}`);
    this.name = "ProtocolError";
    this.code = params.code;
    this.remoteMessage = params.message;
    this.stacktrace = params.stacktrace;
    this.method = params.method;
  }

  is(code: string): boolean {
    return this.code === code;
  }
}

export class ClosedError extends WheelhouseError {
  readonly reason: string;

  constructor(reason = "Client closed") {
    super(reason);
    this.name = "ClosedError";
    this.reason = reason;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  return String(cause);
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
