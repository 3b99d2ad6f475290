import { spawn, type ChildProcess } from "node:child_process";
import type { Readable } from "node:stream";

/**
 * A structured error representing a failed Command Channel invocation.
 */
export class CommandError extends Error {
  public readonly kind: "missing" | "failed" | "timeout";
  public readonly details: Record<string, unknown>;

  public constructor(kind: "missing" | "failed" | "timeout", message: string, details: Record<string, unknown>) {
    super(message);
    this.name = "CommandError";
    this.kind = kind;
    this.details = details;
  }
}

export interface ExecOptions {
  /** Bytes written to stdin. When omitted, stdin is empty. */
  input?: string;
  /** Kill the process after this many milliseconds. */
  timeoutMs?: number;
}

export interface ExecResult {
  argv: string[];
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface SpawnOptions {
  /** Expose the child's stderr as a stream instead of discarding it. */
  pipeStderr?: boolean;
  /** Let the child outlive this process. */
  detached?: boolean;
}

export interface ExitStatus {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Handle to a process that was started and left running.
 */
export interface SpawnedProcess {
  readonly argv: string[];
  readonly pid: number | undefined;
  /** Present only when spawned with `pipeStderr`. */
  readonly stderr: Readable | null;
  wait(): Promise<ExitStatus>;
  /** Terminate the process if it is still running. */
  kill(): void;
}

/**
 * The Command Channel: executes an argument vector on the host, either to
 * completion or in the background.
 */
export interface CommandRunner {
  exec(argv: string[], options?: ExecOptions): Promise<ExecResult>;
  spawn(argv: string[], options?: SpawnOptions): SpawnedProcess;
}

/**
 * Throw a `CommandError` unless the command exited with status 0.
 */
export function checkResult(result: ExecResult): ExecResult {
  if (result.exitCode !== 0) {
    throw new CommandError("failed", `${result.argv.join(" ")} failed`, {
      args: result.argv,
      status: result.exitCode,
      signal: result.signal,
      stdout: result.stdout,
      stderr: result.stderr,
    });
  }
  return result;
}

/**
 * An argument vector bound to a runner. Device and Host hand these out so
 * callers decide whether to block on the result or leave it running.
 */
export class Command {
  public constructor(
    private readonly runner: CommandRunner,
    public readonly argv: string[]
  ) {}

  /** Run to completion; a nonzero exit is reported, not thrown. */
  public output(options?: ExecOptions): Promise<ExecResult> {
    return this.runner.exec(this.argv, options);
  }

  /** Run to completion and throw `CommandError` on a nonzero exit. */
  public async check(options?: ExecOptions): Promise<ExecResult> {
    return checkResult(await this.output(options));
  }

  public spawn(options?: SpawnOptions): SpawnedProcess {
    return this.runner.spawn(this.argv, options);
  }

  public toString(): string {
    return this.argv.join(" ");
  }
}

function missingError(argv: string[], err: Error): CommandError {
  return new CommandError("missing", `Failed to execute ${argv[0]}: ${err.message}`, {
    args: argv,
    error: String(err),
  });
}

class ChildSpawnedProcess implements SpawnedProcess {
  public readonly stderr: Readable | null;
  private status: ExitStatus | undefined;
  private failure: CommandError | undefined;
  private readonly waiters: Array<{ resolve: (s: ExitStatus) => void; reject: (e: Error) => void }> = [];

  public constructor(public readonly argv: string[], private readonly child: ChildProcess) {
    this.stderr = child.stderr;
    child.once("error", (err) => this.settle(undefined, missingError(argv, err)));
    child.once("close", (code, signal) => this.settle({ exitCode: code, signal }, undefined));
  }

  public get pid(): number | undefined {
    return this.child.pid;
  }

  public kill(): void {
    if (!this.status && !this.failure) {
      this.child.kill();
    }
  }

  public wait(): Promise<ExitStatus> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.status) return Promise.resolve(this.status);
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  private settle(status: ExitStatus | undefined, failure: CommandError | undefined): void {
    if (this.status || this.failure) return;
    this.status = status;
    this.failure = failure;
    for (const waiter of this.waiters.splice(0)) {
      if (failure) waiter.reject(failure);
      else if (status) waiter.resolve(status);
    }
  }
}

/**
 * Command Channel backed by `node:child_process`.
 */
export class NodeCommandRunner implements CommandRunner {
  public async exec(argv: string[], options?: ExecOptions): Promise<ExecResult> {
    if (argv.length === 0) throw new CommandError("failed", "argv must be non-empty", { args: argv });

    const child = spawn(argv[0], argv.slice(1), {
      stdio: [options?.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));
    const stdin: { error?: Error } = {};
    if (options?.input !== undefined) {
      // A child may exit without reading all of its input; its exit status decides the result.
      child.stdin?.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code !== "EPIPE") stdin.error = err;
      });
      child.stdin?.end(options.input);
    }

    let timedOut = false;
    const timeout =
      options?.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, options.timeoutMs);

    try {
      const { exitCode, signal } = await new Promise<ExitStatus>((resolve, reject) => {
        child.once("error", (err) => reject(missingError(argv, err)));
        child.once("close", (code, sig) => resolve({ exitCode: code, signal: sig }));
      });

      if (timedOut) {
        throw new CommandError("timeout", `${argv.join(" ")} timed out after ${options?.timeoutMs}ms`, {
          args: argv,
          timeoutMs: options?.timeoutMs,
        });
      }

      if (stdin.error) {
        throw new CommandError("failed", `Failed to write input to ${argv[0]}: ${stdin.error.message}`, {
          args: argv,
          error: String(stdin.error),
        });
      }

      return {
        argv,
        exitCode,
        signal,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  public spawn(argv: string[], options?: SpawnOptions): SpawnedProcess {
    if (argv.length === 0) throw new CommandError("failed", "argv must be non-empty", { args: argv });

    const child = spawn(argv[0], argv.slice(1), {
      detached: options?.detached ?? false,
      stdio: ["ignore", "ignore", options?.pipeStderr ? "pipe" : "ignore"],
    });
    const handle = new ChildSpawnedProcess(argv, child);
    if (options?.detached) {
      child.unref();
    }
    return handle;
  }
}
