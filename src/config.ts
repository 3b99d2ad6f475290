import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { isRecord } from "./utils.js";

/** Module-level config cache to avoid redundant fs.readFileSync calls. */
let cachedConfig: RfuzzConfig | null = null;

export type RfuzzTransport = "stdio";

export type LogLevelName = "debug" | "info" | "warn" | "error";

/**
 * How to reach the target device over ssh/scp.
 */
export interface DeviceConfig {
  /** Network address of the device (IPv4, IPv6 or hostname). */
  address?: string;
  /** ssh port. */
  port?: number;
  /** Private key passed as `-i`. */
  identityFile?: string;
  /** ssh configuration file passed as `-F`. */
  sshConfig?: string;
  /** Number of `-v` flags (0-3). */
  verbosity: number;
  /** Extra `-o` options, e.g. `StrictHostKeyChecking=no`. */
  options: string[];
}

/**
 * Overrides for the host-side symbolizer. Unset fields are derived from the
 * build directory and the source root.
 */
export interface SymbolizerConfig {
  executable?: string;
  llvmSymbolizer?: string;
  buildIdDirs?: string[];
}

export interface RfuzzConfig {
  /**
   * MCP transport mode.
   *
   * Currently only `stdio` is supported.
   */
  transport: RfuzzTransport;

  /** Logging verbosity for the host process. */
  logLevel: LogLevelName;

  /** Checkout root that relative paths are anchored under. */
  sourceRoot: string;

  /** Build output directory, relative to `sourceRoot` or absolute. */
  buildDir: string;

  /** Where per-fuzzer output directories are created (default: `<sourceRoot>/local`). */
  outputDir?: string;

  device: DeviceConfig;

  symbolizer: SymbolizerConfig;

  /** Delay between status checks while monitoring a background run. */
  pollIntervalMs: number;
}

export const DEFAULT_POLL_INTERVAL_MS = 2_000;

/**
 * Get the project root directory by resolving from this file's location.
 * Works regardless of the process's current working directory.
 */
function getProjectRootDir(): string {
  const thisFile = fileURLToPath(import.meta.url);
  const thisDir = path.dirname(thisFile);
  // This file is dist/config.js (or src/config.ts under test), so project root is one level up
  return path.resolve(thisDir, "..");
}

function optionalString(
  obj: Record<string, unknown>,
  key: string,
  field: string,
  configPath: string
): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new Error(`Invalid config.${field}: expected non-empty string at ${configPath}`);
  }
  return value.trim();
}

function optionalStringArray(
  obj: Record<string, unknown>,
  key: string,
  field: string,
  configPath: string
): string[] | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string" && v.length > 0)) {
    throw new Error(`Invalid config.${field}: expected array of non-empty strings at ${configPath}`);
  }
  return value;
}

function parseDeviceConfig(value: unknown, configPath: string): DeviceConfig {
  if (value === undefined) {
    return { verbosity: 0, options: [] };
  }
  if (!isRecord(value)) {
    throw new Error(`Invalid config.device: expected JSON object at ${configPath}`);
  }

  const port = value.port;
  if (port !== undefined && (typeof port !== "number" || !Number.isInteger(port) || port <= 0 || port > 65535)) {
    throw new Error(`Invalid config.device.port: expected integer in 1..65535 at ${configPath}`);
  }
  const verbosity = value.verbosity ?? 0;
  if (typeof verbosity !== "number" || !Number.isInteger(verbosity) || verbosity < 0 || verbosity > 3) {
    throw new Error(`Invalid config.device.verbosity: expected integer in 0..3 at ${configPath}`);
  }

  return {
    address: optionalString(value, "address", "device.address", configPath),
    port,
    identityFile: optionalString(value, "identityFile", "device.identityFile", configPath),
    sshConfig: optionalString(value, "sshConfig", "device.sshConfig", configPath),
    verbosity,
    options: optionalStringArray(value, "options", "device.options", configPath) ?? [],
  };
}

function parseSymbolizerConfig(value: unknown, configPath: string): SymbolizerConfig {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`Invalid config.symbolizer: expected JSON object at ${configPath}`);
  }
  return {
    executable: optionalString(value, "executable", "symbolizer.executable", configPath),
    llvmSymbolizer: optionalString(value, "llvmSymbolizer", "symbolizer.llvmSymbolizer", configPath),
    buildIdDirs: optionalStringArray(value, "buildIdDirs", "symbolizer.buildIdDirs", configPath),
  };
}

/**
 * Validate a parsed configuration document.
 *
 * @param parsed - Result of `JSON.parse` on the config file.
 * @param configPath - Used in error messages only.
 * @throws If any field is missing or malformed.
 */
export function parseConfig(parsed: unknown, configPath: string): RfuzzConfig {
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config: expected JSON object at ${configPath}`);
  }

  const transport = parsed.transport;
  const logLevel = parsed.logLevel;
  const sourceRoot = parsed.sourceRoot;
  const buildDir = parsed.buildDir;
  const pollIntervalMs = parsed.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

  if (transport !== "stdio") {
    throw new Error(
      `Invalid config.transport: expected \"stdio\" at ${configPath}`
    );
  }
  if (logLevel !== "debug" && logLevel !== "info" && logLevel !== "warn" && logLevel !== "error") {
    throw new Error(
      `Invalid config.logLevel: expected debug|info|warn|error at ${configPath}`
    );
  }
  if (typeof sourceRoot !== "string" || sourceRoot.trim().length === 0) {
    throw new Error(`Invalid config.sourceRoot: expected non-empty string at ${configPath}`);
  }
  if (typeof buildDir !== "string" || buildDir.trim().length === 0) {
    throw new Error(`Invalid config.buildDir: expected non-empty string at ${configPath}`);
  }
  if (typeof pollIntervalMs !== "number" || !Number.isFinite(pollIntervalMs) || pollIntervalMs < 0) {
    throw new Error(`Invalid config.pollIntervalMs: expected non-negative number at ${configPath}`);
  }

  return {
    transport,
    logLevel,
    sourceRoot: sourceRoot.trim(),
    buildDir: buildDir.trim(),
    outputDir: optionalString(parsed, "outputDir", "outputDir", configPath),
    device: parseDeviceConfig(parsed.device, configPath),
    symbolizer: parseSymbolizerConfig(parsed.symbolizer, configPath),
    pollIntervalMs,
  };
}

/**
 * Load runtime configuration from `config.json`.
 *
 * Precedence:
 * - `RFUZZ_CONFIG_PATH` env var (absolute path)
 * - `<projectRoot>/config.json` (project root detected via import.meta.url)
 *
 * @throws If the config file is missing or malformed.
 */
export function loadConfig(): RfuzzConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const projectRoot = getProjectRootDir();
  const configPath = process.env.RFUZZ_CONFIG_PATH
    ? path.resolve(process.env.RFUZZ_CONFIG_PATH)
    : path.join(projectRoot, "config.json");

  const raw = fs.readFileSync(configPath, "utf-8");
  cachedConfig = parseConfig(JSON.parse(raw), configPath);
  return cachedConfig;
}

/**
 * Clear the cached config and re-read from disk on the next `loadConfig()` call.
 *
 * Call this if `config.json` (or `RFUZZ_CONFIG_PATH`) has been modified at runtime
 * and the process needs to pick up the changes.
 */
export function reloadConfig(): RfuzzConfig {
  cachedConfig = null;
  return loadConfig();
}

/**
 * Resolve the configured source root to an absolute path.
 *
 * - If `config.sourceRoot` is absolute, it is returned as-is.
 * - If it is relative, it is resolved relative to the project root (the directory
 *   containing `config.json`).
 */
export function resolveSourceRoot(config: RfuzzConfig): string {
  const projectRoot = getProjectRootDir();
  return path.isAbsolute(config.sourceRoot)
    ? config.sourceRoot
    : path.resolve(projectRoot, config.sourceRoot);
}
