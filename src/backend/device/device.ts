import { setTimeout as sleep } from "node:timers/promises";
import { glob } from "glob";
import type { DeviceConfig } from "../../config.js";
import type { Logger } from "../../logger.js";
import { Command, CommandError } from "../command/command.js";
import { HostError, type FuzzTarget, type Host } from "../host/host.js";

/** Returned by `processId` when no matching process is running. */
export const NOT_RUNNING = -1;

export type DeviceOptions = Omit<DeviceConfig, "address">;

export interface ProcessEntry extends FuzzTarget {
  pid: number;
}

export interface FetchOptions {
  /** Additional attempts after the first failure. */
  retries?: number;
  retryDelayMs?: number;
}

// e.g. "  foo_fuzzer.cmx[12345]: fuchsia-pkg://fuchsia.com/foo_fuzzers#meta/foo_fuzzer.cmx"
const STATUS_LINE = /^\s*(\S+)\.cmx\[(\d+)\]: fuchsia-pkg:\/\/fuchsia\.com\/([^#]+)#meta\//;

// Substrings that mark a syslog line as written by the fuzzing engine or a sanitizer.
const FUZZING_MARKERS = ["{{{reset}}}", "libFuzzer", "Sanitizer"];

function processKey(pkg: string, executable: string): string {
  return `${pkg}/${executable}`;
}

/**
 * One target device, reached only through ssh and scp.
 */
export class Device {
  private pids: Map<string, ProcessEntry> | null = null;

  public constructor(
    public readonly host: Host,
    public readonly address: string,
    public readonly options: DeviceOptions = { verbosity: 0, options: [] },
    private readonly logger?: Logger
  ) {}

  public toString(): string {
    return this.address;
  }

  private transportOptions(portFlag: "-p" | "-P"): string[] {
    const opts: string[] = [];
    if (this.options.sshConfig) opts.push("-F", this.options.sshConfig);
    if (this.options.identityFile) opts.push("-i", this.options.identityFile);
    if (this.options.port) opts.push(portFlag, String(this.options.port));
    if (this.options.verbosity > 0) opts.push(`-${"v".repeat(this.options.verbosity)}`);
    for (const option of this.options.options) {
      opts.push("-o", option);
    }
    return opts;
  }

  /** `[address]:path`, the notation scp uses for remote paths. */
  public remotePath(p: string): string {
    return `[${this.address}]:${p}`;
  }

  /**
   * Build a command that runs `args` on the device. Nothing is executed until
   * the caller runs or spawns the returned command; stdin is always empty.
   */
  public runRemote(args: string[]): Command {
    const argv = ["ssh", ...this.transportOptions("-p"), this.address, ...args];
    this.logger?.debug("+ " + argv.join(" "));
    return new Command(this.host.runner, argv);
  }

  private copy(sources: string[], destination: string): Command {
    const argv = ["scp", ...this.transportOptions("-P"), ...sources, destination];
    this.logger?.debug("+ " + argv.join(" "));
    return new Command(this.host.runner, argv);
  }

  /**
   * Re-read the process table and replace the cached one entirely.
   * Lines that do not look like component status lines are skipped.
   */
  public async refresh(): Promise<void> {
    const result = await this.runRemote(["cs"]).check();
    const pids = new Map<string, ProcessEntry>();
    for (const line of result.stdout.split(/\r?\n/)) {
      const match = STATUS_LINE.exec(line);
      if (!match) continue;
      const [, executable, pid, pkg] = match;
      pids.set(processKey(pkg, executable), { package: pkg, executable, pid: Number(pid) });
    }
    this.pids = pids;
  }

  /**
   * Look up the process ID of a fuzz target.
   *
   * The process table is cached; it is only re-read on first use or when
   * `refresh` is set, so callers choose how stale a view they accept.
   *
   * @returns The PID, or `NOT_RUNNING`.
   */
  public async processId(pkg: string, executable: string, refresh = false): Promise<number> {
    if (!this.pids || refresh) {
      await this.refresh();
    }
    return this.pids?.get(processKey(pkg, executable))?.pid ?? NOT_RUNNING;
  }

  /** Snapshot of the cached process table (reads it if never read). */
  public async processes(): Promise<ProcessEntry[]> {
    if (!this.pids) {
      await this.refresh();
    }
    return [...(this.pids?.values() ?? [])];
  }

  /**
   * List a device directory as name → size.
   *
   * A failing listing (e.g. a directory that does not exist yet) yields an
   * empty map. Lines that are not `ls -l` file entries are skipped.
   */
  public async list(p: string): Promise<Map<string, number>> {
    const result = await this.runRemote(["ls", "-l", p]).output();
    const entries = new Map<string, number>();
    if (result.exitCode !== 0) {
      return entries;
    }
    for (const line of result.stdout.split(/\r?\n/)) {
      // -rw-r--r-- 1 0 0 1796 Mar 19 17:25 name with spaces
      const parts = line.trim().split(/\s+/);
      if (parts.length < 9 || !/^\d+$/.test(parts[4])) continue;
      entries.set(parts.slice(8).join(" "), Number(parts[4]));
    }
    return entries;
  }

  public async mkdir(p: string): Promise<void> {
    await this.runRemote(["mkdir", "-p", p]).check();
  }

  /** Remove files on the device; `pattern` is expanded by the remote shell. */
  public async remove(pattern: string): Promise<void> {
    await this.runRemote(["rm", "-f", pattern]).check();
  }

  public async kill(pid: number): Promise<void> {
    await this.runRemote(["kill", String(pid)]).check();
  }

  /**
   * Dump the device syslog.
   *
   * @param args - Extra `log_listener` arguments, e.g. `["--pid", "123"]`.
   */
  public async dumpLog(args: string[] = []): Promise<string> {
    const result = await this.runRemote(["log_listener", "--dump_logs", "yes", ...args]).check();
    return result.stdout;
  }

  /**
   * Guess the PID of the most recent fuzzing process from the syslog.
   *
   * Syslog lines look like `[<timestamp>][<pid>][<tid>][<name>] <data>`; the
   * PID of the last line mentioning the fuzzing engine or a sanitizer wins.
   *
   * @returns The PID, or `NOT_RUNNING` if no line matches.
   */
  public async guessProcessId(): Promise<number> {
    const log = await this.dumpLog(["--pretty", "no"]);
    let pid = NOT_RUNNING;
    for (const line of log.split(/\r?\n/)) {
      const parts = line.split("][");
      if (parts.length < 3 || !FUZZING_MARKERS.some((marker) => line.includes(marker))) continue;
      const candidate = parts[1].trim();
      if (/^\d+$/.test(candidate)) {
        pid = Number(candidate);
      }
    }
    return pid;
  }

  /**
   * Copy device files to a host directory.
   *
   * @param destDir - Existing host directory.
   * @param sources - Device paths; the remote shell expands wildcards.
   * @throws HostError if `destDir` is not a directory.
   * @throws CommandError once every attempt has failed.
   */
  public async fetch(destDir: string, sources: string[], options: FetchOptions = {}): Promise<void> {
    if (!(await this.host.isdir(destDir))) {
      throw new HostError("INVALID_ARGUMENT", `Invalid destination directory: ${destDir}`);
    }
    if (sources.length === 0) return;

    const cmd = this.copy(sources.map((src) => this.remotePath(src)), destDir);
    const retries = options.retries ?? 0;
    for (let attempt = 0; ; attempt++) {
      try {
        await cmd.check();
        return;
      } catch (err) {
        if (!(err instanceof CommandError) || err.kind !== "failed" || attempt >= retries) {
          throw err;
        }
        this.logger?.warn("Fetch failed; retrying", { attempt: attempt + 1, retries, sources });
        await sleep(options.retryDelayMs ?? 1_000);
      }
    }
  }

  /**
   * Copy host files matching `patterns` to a device directory.
   *
   * Globs are expanded on the host, since the remote end does not expand them.
   *
   * @returns The host files that were copied; empty if nothing matched.
   */
  public async store(destDir: string, patterns: string[]): Promise<string[]> {
    const files: string[] = [];
    for (const pattern of patterns) {
      const matches = await glob(pattern, { nodir: true });
      files.push(...matches.sort());
    }
    if (files.length === 0) {
      return files;
    }
    await this.copy(files, this.remotePath(destDir)).check();
    return files;
  }
}
