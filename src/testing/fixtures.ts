import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { RfuzzConfig } from "../config.js";
import type { Display } from "../logger.js";
import { Host } from "../backend/host/host.js";
import type { CommandRunner } from "../backend/command/command.js";

export const SYMBOLIZER = "/toolchain/symbolize";

export async function makeTempDir(prefix = "rfuzz-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const file = path.join(root, rel);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
  }
}

/**
 * Lay out a minimal checkout under `root`: a build directory with a symbolizer
 * and a build-id directory, plus the prebuilt llvm-symbolizer.
 */
export async function makeCheckout(root: string, manifest?: unknown): Promise<void> {
  await writeFiles(root, {
    "out/default/host_x64/symbolize": "",
    "prebuilt/third_party/clang/linux-x64/bin/llvm-symbolizer": "",
  });
  await fs.mkdir(path.join(root, "out/default/.build-id"), { recursive: true });
  if (manifest !== undefined) {
    await writeFiles(root, { "out/default/fuzzers.json": JSON.stringify(manifest) });
  }
}

export function testConfig(sourceRoot: string, overrides: Partial<RfuzzConfig> = {}): RfuzzConfig {
  return {
    transport: "stdio",
    logLevel: "error",
    sourceRoot,
    buildDir: "out/default",
    device: { address: "::1", verbosity: 0, options: [] },
    symbolizer: {},
    pollIntervalMs: 0,
    ...overrides,
  };
}

/** A Host over `sourceRoot` whose tools are never looked up on disk. */
export function testHost(runner: CommandRunner, sourceRoot: string, display?: Display): Host {
  return new Host(
    {
      sourceRoot,
      buildDir: path.join(sourceRoot, "out/default"),
      symbolizerExec: SYMBOLIZER,
      llvmSymbolizer: "/toolchain/llvm-symbolizer",
      buildIdDirs: ["/toolchain/.build-id"],
    },
    runner,
    { display }
  );
}

export function recordingDisplay(): Display & { lines: string[] } {
  const lines: string[] = [];
  return { lines, echo: (text) => lines.push(text) };
}

/** Matches the device's component status command. */
export function isStatus(argv: string[]): boolean {
  return argv[0] === "ssh" && argv[argv.length - 1] === "cs";
}
