import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod/v4";
import { resolveSourceRoot, type RfuzzConfig } from "../../config.js";
import { silentDisplay, type Display, type Logger } from "../../logger.js";
import { Command, type CommandRunner } from "../command/command.js";

export class HostError extends Error {
  public readonly code: "INVALID_ARGUMENT" | "NOT_FOUND";
  public readonly details?: Record<string, unknown>;

  public constructor(code: HostError["code"], message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "HostError";
    this.code = code;
    this.details = details;
  }
}

/**
 * A fuzz target as named by the build: the GN `fuzzers_package` and one of
 * its `fuzzers`.
 */
export interface FuzzTarget {
  package: string;
  executable: string;
}

/**
 * Absolute host paths, already validated.
 */
export interface HostPaths {
  sourceRoot: string;
  buildDir: string;
  symbolizerExec: string;
  llvmSymbolizer: string;
  buildIdDirs: string[];
}

export interface HostOptions {
  logger?: Logger;
  /** Where foreground fuzzer output is echoed. */
  display?: Display;
}

/** Build metadata: one record per fuzz package. */
const zFuzzersManifest = z.array(
  z.object({
    fuzzers_package: z.string().min(1),
    fuzzers: z.array(z.string().min(1)),
  })
);

/** Default manifest location, relative to the build directory. */
export const FUZZERS_MANIFEST = "fuzzers.json";

// Kernel log lines are re-emitted by the symbolizer with a "[<ts>][klog] INFO: " prefix.
const KLOG_PREFIX = /[0-9[\].]*\[klog\] INFO: /g;

async function statKind(p: string): Promise<"dir" | "file" | undefined> {
  try {
    const st = await fs.stat(p);
    return st.isDirectory() ? "dir" : "file";
  } catch {
    return undefined;
  }
}

/**
 * The local build environment: path resolution, the fuzz target catalog and
 * log symbolization.
 */
export class Host {
  public readonly display: Display;
  private readonly logger?: Logger;
  private targets: FuzzTarget[] = [];

  public constructor(
    public readonly paths: HostPaths,
    public readonly runner: CommandRunner,
    options: HostOptions = {}
  ) {
    this.display = options.display ?? silentDisplay;
    this.logger = options.logger;
  }

  /**
   * Resolve and validate every configured path before any device interaction.
   *
   * @throws HostError if a configured directory or tool does not exist.
   */
  public static async create(config: RfuzzConfig, runner: CommandRunner, options: HostOptions = {}): Promise<Host> {
    const sourceRoot = resolveSourceRoot(config);
    if ((await statKind(sourceRoot)) !== "dir") {
      throw new HostError("INVALID_ARGUMENT", `Invalid source root: ${sourceRoot}`);
    }
    const anchor = (p: string) => (path.isAbsolute(p) ? p : path.join(sourceRoot, p));

    const buildDir = anchor(config.buildDir);
    if ((await statKind(buildDir)) !== "dir") {
      throw new HostError("INVALID_ARGUMENT", `Invalid build directory: ${buildDir}`);
    }

    const symbolizerExec = config.symbolizer.executable
      ? anchor(config.symbolizer.executable)
      : path.join(buildDir, "host_x64", "symbolize");
    if ((await statKind(symbolizerExec)) !== "file") {
      throw new HostError("INVALID_ARGUMENT", `Invalid symbolizer: ${symbolizerExec}`);
    }

    const llvmSymbolizer = config.symbolizer.llvmSymbolizer
      ? anchor(config.symbolizer.llvmSymbolizer)
      : anchor("prebuilt/third_party/clang/linux-x64/bin/llvm-symbolizer");
    if ((await statKind(llvmSymbolizer)) !== "file") {
      throw new HostError("INVALID_ARGUMENT", `Invalid llvm-symbolizer: ${llvmSymbolizer}`);
    }

    let buildIdDirs: string[];
    if (config.symbolizer.buildIdDirs) {
      buildIdDirs = config.symbolizer.buildIdDirs.map(anchor);
      for (const dir of buildIdDirs) {
        if ((await statKind(dir)) !== "dir") {
          throw new HostError("INVALID_ARGUMENT", `Invalid build ID directory: ${dir}`);
        }
      }
    } else {
      const candidates = [path.join(buildDir, ".build-id"), anchor("prebuilt/.build-id")];
      buildIdDirs = [];
      for (const dir of candidates) {
        if ((await statKind(dir)) === "dir") buildIdDirs.push(dir);
      }
      if (buildIdDirs.length === 0) {
        throw new HostError("NOT_FOUND", "No build ID directories found.", { candidates });
      }
    }

    return new Host({ sourceRoot, buildDir, symbolizerExec, llvmSymbolizer, buildIdDirs }, runner, options);
  }

  /**
   * Anchor a path under the source root. Absolute paths (including ones this
   * method already returned) are left untouched, so repeated application is a no-op.
   */
  public fxpath(...segments: string[]): string {
    const joined = path.join(...segments);
    return path.isAbsolute(joined) ? joined : path.join(this.paths.sourceRoot, joined);
  }

  public async isdir(p: string): Promise<boolean> {
    return (await statKind(p)) === "dir";
  }

  public async isfile(p: string): Promise<boolean> {
    return (await statKind(p)) === "file";
  }

  public async mkdir(p: string): Promise<void> {
    await fs.mkdir(p, { recursive: true });
  }

  public async rm(p: string): Promise<void> {
    await fs.rm(p, { recursive: true, force: true });
  }

  /**
   * Point `linkPath` at `target`, replacing an existing link.
   */
  public async link(target: string, linkPath: string): Promise<void> {
    await fs.rm(linkPath, { force: true });
    await fs.symlink(target, linkPath);
  }

  public echo(text: string): void {
    this.display.echo(text);
  }

  /**
   * Load the fuzz target catalog from build metadata.
   *
   * @param source - Manifest path; defaults to `<buildDir>/fuzzers.json`.
   * @returns (package, executable) pairs sorted by package, then executable.
   * @throws HostError if the manifest is missing or malformed.
   */
  public async readFuzzerManifest(source?: string): Promise<FuzzTarget[]> {
    const manifestPath = source ? this.fxpath(source) : path.join(this.paths.buildDir, FUZZERS_MANIFEST);

    let raw: string;
    try {
      raw = await fs.readFile(manifestPath, "utf-8");
    } catch (err) {
      throw new HostError("NOT_FOUND", `Unable to read fuzzer manifest: ${manifestPath}`, {
        error: String(err),
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new HostError("INVALID_ARGUMENT", `Fuzzer manifest is not valid JSON: ${manifestPath}`, {
        error: String(err),
      });
    }
    const records = zFuzzersManifest.safeParse(parsed);
    if (!records.success) {
      throw new HostError("INVALID_ARGUMENT", `Malformed fuzzer manifest: ${manifestPath}`, {
        issues: records.error.issues.map((issue) => issue.message),
      });
    }

    const targets: FuzzTarget[] = [];
    for (const record of records.data) {
      for (const executable of record.fuzzers) {
        targets.push({ package: record.fuzzers_package, executable });
      }
    }
    targets.sort((a, b) =>
      a.package === b.package ? compare(a.executable, b.executable) : compare(a.package, b.package)
    );
    this.targets = targets;
    return targets;
  }

  /**
   * Filter the loaded catalog by a name pattern.
   *
   * `pkg/exe` matches by substring on each half; a bare pattern matches if
   * either half contains it. An empty pattern matches everything.
   */
  public matchFuzzers(pattern = ""): FuzzTarget[] {
    const slash = pattern.indexOf("/");
    if (slash === -1) {
      return this.targets.filter((t) => t.package.includes(pattern) || t.executable.includes(pattern));
    }
    const pkg = pattern.slice(0, slash);
    const exe = pattern.slice(slash + 1);
    return this.targets.filter((t) => t.package.includes(pkg) && t.executable.includes(exe));
  }

  /**
   * Translate raw addresses in a log into function/file/line information.
   *
   * Symbolization is best-effort: a failing symbolizer yields an empty string.
   */
  public async symbolize(raw: string): Promise<string> {
    const argv = [this.paths.symbolizerExec, "-ids-rel", "-llvm-symbolizer", this.paths.llvmSymbolizer];
    for (const dir of this.paths.buildIdDirs) {
      argv.push("-build-id-dir", dir);
    }
    const result = await new Command(this.runner, argv).output({ input: raw });
    if (result.exitCode !== 0) {
      this.logger?.warn("Symbolizer failed; continuing with raw log", {
        status: result.exitCode,
        stderr: result.stderr.trim(),
      });
      return "";
    }
    return result.stdout.replace(KLOG_PREFIX, "");
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
