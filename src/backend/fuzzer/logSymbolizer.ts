import { NOT_RUNNING, type Device } from "../device/device.js";

/**
 * Where a reconstructed log is written, one line or block at a time.
 */
export interface LogSink {
  write(text: string): Promise<unknown>;
}

/**
 * - `awaiting-pid`: no `==<pid>==` marker seen yet.
 * - `awaiting-symbolization`: PID known, no mutation dump seen yet.
 * - `done`: the symbolized syslog has been written; later dumps are ignored.
 */
export type SymbolizerState = "awaiting-pid" | "awaiting-symbolization" | "done";

export interface SymbolizeResult {
  /** Whether the symbolized syslog block was written. */
  symbolized: boolean;
  /** Last observed (or guessed) process ID. */
  pid: number;
  /** Names announced via `Test unit written to data/<name>`, in order. */
  artifacts: string[];
}

const PID_PATTERN = /^==(\d+)==/;
// Printed by libFuzzer when it dumps the current unit.
const MUTATION_PATTERN = /^MS: [0-9]*/;
const ARTIFACT_PATTERN = /Test unit written to data\/(\S+)/;

/**
 * Reconstructs a readable fuzzer log from a line stream.
 *
 * Each raw line is copied to the sink. The first mutation dump in the stream
 * pulls the process's syslog from the device, symbolizes it on the host and
 * writes it ahead of that line. An instance processes exactly one stream.
 */
export class LogSymbolizer {
  private current: SymbolizerState = "awaiting-pid";
  private pid = NOT_RUNNING;
  private readonly artifacts: string[] = [];

  public constructor(
    private readonly device: Device,
    private readonly sink: LogSink,
    private readonly echo: boolean
  ) {}

  public get state(): SymbolizerState {
    return this.current;
  }

  public async processLine(line: string): Promise<void> {
    const pidMatch = PID_PATTERN.exec(line);
    if (pidMatch) {
      this.pid = Number(pidMatch[1]);
      if (this.current === "awaiting-pid") this.current = "awaiting-symbolization";
    }

    if (MUTATION_PATTERN.test(line) && this.current !== "done") {
      await this.writeSymbolizedSyslog();
    }

    const artifactMatch = ARTIFACT_PATTERN.exec(line);
    if (artifactMatch) {
      this.artifacts.push(artifactMatch[1]);
    }

    await this.sink.write(line + "\n");
    if (this.echo) {
      this.device.host.echo(line.trimEnd());
    }
  }

  public async run(lines: AsyncIterable<string> | Iterable<string>): Promise<SymbolizeResult> {
    for await (const line of lines) {
      await this.processLine(line);
    }
    return {
      symbolized: this.current === "done",
      pid: this.pid,
      artifacts: [...this.artifacts],
    };
  }

  private async writeSymbolizedSyslog(): Promise<void> {
    if (this.current === "awaiting-pid") {
      this.pid = await this.device.guessProcessId();
    }
    // Marked done before the fetch so a failure cannot trigger a second one.
    this.current = "done";

    const raw = await this.device.dumpLog(["--pid", String(this.pid)]);
    const symbolized = await this.device.host.symbolize(raw);
    await this.sink.write(symbolized);
    if (this.echo && symbolized.trim().length > 0) {
      this.device.host.echo(symbolized.trim());
    }
  }
}
