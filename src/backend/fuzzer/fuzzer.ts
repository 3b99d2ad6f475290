import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import readline from "node:readline";
import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../../logger.js";
import { DEFAULT_POLL_INTERVAL_MS } from "../../config.js";
import type { Command } from "../command/command.js";
import { NOT_RUNNING, type Device } from "../device/device.js";
import type { FuzzTarget } from "../host/host.js";
import { LogSymbolizer, type SymbolizeResult } from "./logSymbolizer.js";

export class FuzzerError extends Error {
  public readonly code: "ALREADY_RUNNING" | "NO_UNITS" | "NOT_FOUND" | "INVALID_ARGUMENT";
  public readonly details?: Record<string, unknown>;

  public constructor(code: FuzzerError["code"], message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "FuzzerError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Name prefixes libFuzzer gives the test units it saves. Files in the data
 * namespace with one of these prefixes are artifacts, never corpus.
 */
export const ARTIFACT_PREFIXES = ["crash", "leak", "mismatch", "oom", "slow-unit", "timeout"] as const;

/** libFuzzer signal handlers that are disabled so a debugger can attach. */
export const DEBUG_OPTIONS = ["handle_segv", "handle_bus", "handle_ill", "handle_fpe", "handle_abrt"] as const;

/** Options libFuzzer needs to report coverage of the corpus without fuzzing. */
const ANALYSIS_OPTIONS: Record<string, string> = {
  runs: "0",
  print_final_stats: "1",
  print_coverage: "1",
};

export type FuzzerState = "stopped" | "running-foreground" | "running-background";

/**
 * Supplies corpus inputs from somewhere other than the device, e.g. a
 * package server. Files are written to `hostDir`.
 */
export interface CorpusSource {
  fetch(hostDir: string): Promise<string[]>;
}

export interface FuzzerOptions {
  /** Directory under which `<package>_<executable>` output is created. */
  outputRoot?: string;
  pollIntervalMs?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface CorpusStats {
  count: number;
  bytes: number;
}

function timestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}-${pad(d.getHours())}${pad(d.getMinutes())}`;
}

function linesOf(file: string): AsyncIterable<string> {
  return readline.createInterface({ input: createReadStream(file), crlfDelay: Infinity });
}

/**
 * A fuzz target on one device.
 *
 * Running state is never stored: it is derived from the device's process
 * table, so a later invocation (for example one that only calls `monitor()`)
 * picks up where an earlier one left off.
 */
export class Fuzzer implements FuzzTarget {
  /** `-key=value` options passed to libFuzzer; these override the defaults. */
  public libfuzzerOpts: Record<string, string> = {};
  /** Extra inputs passed to libFuzzer. Only `repro` accepts these. */
  public libfuzzerInputs: string[] = [];
  /** Arguments passed to the fuzzer process after `--`. */
  public subprocessArgs: string[] = [];
  public foreground = false;
  public debug = false;

  private readonly options: Record<string, string> = { artifact_prefix: "data/" };
  private readonly pollIntervalMs: number;
  private readonly now: () => Date;
  private readonly logger?: Logger;
  private outputDir: string;
  private logbase: string | undefined;
  private pid = NOT_RUNNING;
  private current: FuzzerState = "stopped";

  public readonly package: string;

  public constructor(
    public readonly device: Device,
    pkg: string,
    public readonly executable: string,
    options: FuzzerOptions = {}
  ) {
    this.package = pkg;
    const outputRoot = options.outputRoot ?? device.host.fxpath("local");
    this.outputDir = path.join(outputRoot, `${this.package}_${this.executable}`);
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  public toString(): string {
    return `${this.package}/${this.executable}`;
  }

  /** Lifecycle state as last observed by this instance. */
  public get state(): FuzzerState {
    return this.current;
  }

  /** Host directory that receives logs and artifacts. */
  public get output(): string {
    return this.outputDir;
  }

  /**
   * @throws FuzzerError if `dir` is not an existing host directory.
   */
  public async setOutput(dir: string): Promise<void> {
    if (!dir || !(await this.device.host.isdir(dir))) {
      throw new FuzzerError("INVALID_ARGUMENT", `Invalid output directory: ${dir}`);
    }
    this.outputDir = dir;
  }

  public url(): string {
    return `fuchsia-pkg://fuchsia.com/${this.package}#meta/${this.executable}.cmx`;
  }

  /** Location of this fuzzer's mutable data on the device. */
  public dataPath(relpath = ""): string {
    return `/data/r/sys/fuchsia.com:${this.package}:0#meta:${this.executable}.cmx/${relpath}`;
  }

  public async measureCorpus(): Promise<CorpusStats> {
    const sizes = await this.device.list(this.dataPath("corpus"));
    let bytes = 0;
    for (const size of sizes.values()) bytes += size;
    return { count: sizes.size, bytes };
  }

  public async listArtifacts(): Promise<string[]> {
    const files = await this.device.list(this.dataPath());
    return [...files.keys()].filter((name) => ARTIFACT_PREFIXES.some((prefix) => name.startsWith(prefix)));
  }

  /**
   * Check the device for a running instance.
   *
   * Without `refresh` the device's cached process table is used; anything
   * that changes state must pass `refresh`.
   */
  public async isRunning(refresh = false): Promise<boolean> {
    this.pid = await this.device.processId(this.package, this.executable, refresh);
    return this.pid > 0;
  }

  /** Process ID from the last `isRunning` check. */
  public get processId(): number {
    return this.pid;
  }

  private async requireStopped(): Promise<void> {
    if (await this.isRunning(true)) {
      throw new FuzzerError("ALREADY_RUNNING", `${this} is running and must be stopped first.`, {
        pid: this.pid,
      });
    }
  }

  /**
   * The argument vector for the device's `run` command, e.g.
   * `run <url> -artifact_prefix=data/ -dict=... -jobs=1 data/corpus/ -- <args>`.
   */
  public buildArgs(inputs: string[], extraOptions: Record<string, string> = {}): string[] {
    const options: Record<string, string> = { ...this.options, ...extraOptions };
    if (!this.foreground) {
      options.jobs = "1";
    }
    if (this.debug) {
      for (const option of DEBUG_OPTIONS) options[option] = "0";
    }
    Object.assign(options, this.libfuzzerOpts);

    const args = ["run", this.url()];
    for (const key of Object.keys(options).sort()) {
      args.push(`-${key}=${options[key]}`);
    }
    args.push(...inputs);
    if (this.subprocessArgs.length > 0) {
      args.push("--", ...this.subprocessArgs);
    }
    return args;
  }

  /**
   * Start fuzzing with the on-device corpus.
   *
   * In the foreground this blocks until the fuzzer exits, echoing its
   * symbolized output. In the background it returns once the run is launched;
   * call `monitor()` (possibly from another invocation) to collect its logs.
   *
   * @throws FuzzerError if the fuzzer is already running or inputs were given.
   */
  public async start(): Promise<void> {
    await this.requireStopped();
    if (this.libfuzzerInputs.length > 0) {
      throw new FuzzerError("INVALID_ARGUMENT", "Passing corpus arguments to libFuzzer is unsupported.", {
        inputs: this.libfuzzerInputs,
      });
    }
    await this.launch({ dict: `pkg/data/${this.executable}/dictionary` });
  }

  private async launch(extraOptions: Record<string, string>): Promise<void> {
    await this.device.remove(this.dataPath("fuzz-*.log"));
    await this.device.host.mkdir(this.outputDir);
    await this.device.mkdir(this.dataPath("corpus"));

    const cmd = this.device.runRemote(this.buildArgs(["data/corpus/"], extraOptions));
    if (this.foreground) {
      await this.runForeground(cmd);
      return;
    }
    // libFuzzer writes fuzz-<job>.log on the device for background jobs.
    const proc = cmd.spawn({ detached: true });
    this.current = "running-background";
    this.logger?.info("Fuzzer started in the background", { fuzzer: String(this), device: this.device.address });
    proc.wait().then(
      (status) => {
        this.logger?.debug("Background launcher exited", { fuzzer: String(this), ...status });
      },
      (err: unknown) => {
        this.current = "stopped";
        this.logger?.warn("Background fuzzer failed to launch", {
          fuzzer: String(this),
          error: err instanceof Error ? err.message : String(err),
        });
      }
    );
  }

  private async runForeground(cmd: Command): Promise<void> {
    const proc = cmd.spawn({ pipeStderr: true });
    this.current = "running-foreground";
    try {
      if (proc.stderr) {
        try {
          await this.symbolizeLog(readline.createInterface({ input: proc.stderr, crlfDelay: Infinity }), 0, true);
        } catch (err) {
          // The remote run must not outlive a failed log pipeline.
          this.logger?.warn("Log processing failed; stopping the fuzzer", {
            fuzzer: String(this),
            error: err instanceof Error ? err.message : String(err),
          });
          proc.kill();
          proc.stderr.resume();
          await proc.wait();
          throw err;
        }
      }
      await proc.wait();
    } finally {
      this.current = "stopped";
    }
  }

  /** Path of the symbolized log for a job; the timestamp is fixed per instance. */
  public logfile(job: number): string {
    this.logbase ??= timestamp(this.now());
    return path.join(this.outputDir, `fuzz-${this.logbase}-${job}.log`);
  }

  /**
   * Run the symbolization pipeline over one log, write the result to the
   * job's log file and fetch every artifact the log announced.
   *
   * @returns Whether a symbolized syslog block was written.
   */
  public async symbolizeLog(lines: AsyncIterable<string> | Iterable<string>, job: number, echo: boolean): Promise<boolean> {
    const logfile = this.logfile(job);
    const result = await this.writeLog(logfile, lines, echo);
    await this.device.host.link(logfile, path.join(this.outputDir, "fuzz-latest.log"));

    if (result.artifacts.length > 0) {
      await this.device.fetch(
        this.outputDir,
        result.artifacts.map((name) => this.dataPath(name))
      );
    }
    if (!result.symbolized) {
      this.logger?.debug("No mutation dump in log; nothing symbolized", { fuzzer: String(this), job });
    }
    return result.symbolized;
  }

  private async writeLog(
    logfile: string,
    lines: AsyncIterable<string> | Iterable<string>,
    echo: boolean
  ): Promise<SymbolizeResult> {
    const handle = await fs.open(logfile, "w");
    try {
      const sink = { write: (text: string) => handle.write(text) };
      return await new LogSymbolizer(this.device, sink, echo).run(lines);
    } finally {
      await handle.close();
    }
  }

  /**
   * Wait for a background run to finish, then retrieve and symbolize its logs.
   *
   * @returns The number of job logs processed (0 if the run left none).
   */
  public async monitor(): Promise<number> {
    while (await this.isRunning(true)) {
      this.current = "running-background";
      await sleep(this.pollIntervalMs);
    }

    const listing = await this.device.list(this.dataPath());
    const logs = [...listing.keys()]
      .filter((name) => /^fuzz-.*\.log$/.test(name))
      .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));
    if (logs.length === 0) {
      this.current = "stopped";
      return 0;
    }

    await this.device.host.mkdir(this.outputDir);
    const staging = await fs.mkdtemp(path.join(os.tmpdir(), "rfuzz-logs-"));
    try {
      await this.device.fetch(staging, logs.map((name) => this.dataPath(name)), { retries: 2 });
      await this.device.remove(this.dataPath("fuzz-*.log"));
      for (const [job, name] of logs.entries()) {
        await this.symbolizeLog(linesOf(path.join(staging, name)), job, false);
      }
    } finally {
      await this.device.host.rm(staging);
      this.current = "stopped";
    }
    return logs.length;
  }

  /**
   * Kill the fuzzer on the device.
   *
   * @returns false if it was not running.
   */
  public async stop(): Promise<boolean> {
    if (!(await this.isRunning(true))) {
      return false;
    }
    await this.device.kill(this.pid);
    this.current = "stopped";
    return true;
  }

  /**
   * Re-run saved test units, e.g. `run <url> -artifact_prefix=data/ data/crash-1234`.
   *
   * Host paths (globs allowed) are copied into the data namespace first and
   * `libfuzzerInputs` is rewritten to their device-relative names.
   *
   * @throws FuzzerError if no units were given or a pattern matches nothing.
   */
  public async repro(): Promise<void> {
    if (this.libfuzzerInputs.length === 0) {
      throw new FuzzerError("NO_UNITS", "No units provided.");
    }
    await this.requireStopped();

    const namespaced: string[] = [];
    for (const pattern of this.libfuzzerInputs) {
      const stored = await this.device.store(this.dataPath(), [pattern]);
      if (stored.length === 0) {
        throw new FuzzerError("NOT_FOUND", `No matching files: "${pattern}".`);
      }
      namespaced.push(...stored.map((file) => path.posix.join("data", path.basename(file))));
    }
    this.libfuzzerInputs = namespaced;

    this.foreground = true;
    await this.device.host.mkdir(this.outputDir);
    await this.runForeground(this.device.runRemote(this.buildArgs(namespaced)));
  }

  /**
   * Merge extra corpora into the on-device corpus, then run once over it in
   * the foreground to report coverage. Explicit corpora are stored before the
   * remote bundle.
   *
   * @param corpora - Host paths or globs.
   * @param remote - Optional source of an additional corpus bundle.
   */
  public async analyze(corpora: string[], remote?: CorpusSource): Promise<void> {
    await this.requireStopped();
    if (this.libfuzzerInputs.length > 0) {
      throw new FuzzerError("INVALID_ARGUMENT", "Passing corpus arguments to libFuzzer is unsupported.", {
        inputs: this.libfuzzerInputs,
      });
    }

    const corpus = this.dataPath("corpus");
    await this.device.mkdir(corpus);
    for (const pattern of corpora) {
      const stored = await this.device.store(corpus, [pattern]);
      if (stored.length === 0) {
        throw new FuzzerError("NOT_FOUND", `No matching files: "${pattern}".`);
      }
    }
    if (remote) {
      const staging = await fs.mkdtemp(path.join(os.tmpdir(), "rfuzz-corpus-"));
      try {
        const files = await remote.fetch(staging);
        await this.device.store(corpus, files);
      } finally {
        await this.device.host.rm(staging);
      }
    }

    this.foreground = true;
    await this.launch({ dict: `pkg/data/${this.executable}/dictionary`, ...ANALYSIS_OPTIONS });
  }
}
