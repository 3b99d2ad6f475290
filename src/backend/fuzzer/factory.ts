import type { RfuzzConfig } from "../../config.js";
import type { Logger } from "../../logger.js";
import { Device } from "../device/device.js";
import type { FuzzTarget, Host } from "../host/host.js";
import { Fuzzer, FuzzerError } from "./fuzzer.js";

/**
 * Everything a caller may set on a fuzzer for one invocation. Each field is
 * applied explicitly by `createFuzzer`.
 */
export interface FuzzerSettings {
  libfuzzerOpts?: Record<string, string>;
  libfuzzerInputs?: string[];
  subprocessArgs?: string[];
  /** Existing host directory for logs and artifacts. */
  output?: string;
  foreground?: boolean;
  debug?: boolean;
}

const OPTION_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Build a Device for `address`, falling back to the configured one.
 *
 * @throws FuzzerError if no address is known.
 */
export function createDevice(host: Host, config: RfuzzConfig, address?: string, logger?: Logger): Device {
  const addr = address ?? config.device.address;
  if (!addr) {
    throw new FuzzerError("INVALID_ARGUMENT", "No device address configured.");
  }
  const { verbosity, options, port, identityFile, sshConfig } = config.device;
  return new Device(
    host,
    addr,
    {
      verbosity,
      options,
      port,
      identityFile: identityFile ? host.fxpath(identityFile) : undefined,
      sshConfig: sshConfig ? host.fxpath(sshConfig) : undefined,
    },
    logger
  );
}

/**
 * Resolve a name pattern against the host's fuzzer catalog.
 *
 * An exact `package/executable` match wins over partial matches.
 *
 * @throws FuzzerError unless exactly one fuzzer matches.
 */
export function resolveFuzzer(host: Host, pattern: string): FuzzTarget {
  const matches = host.matchFuzzers(pattern);
  const exact = matches.find((t) => `${t.package}/${t.executable}` === pattern);
  if (exact) return exact;
  if (matches.length === 0) {
    throw new FuzzerError("NOT_FOUND", `No matching fuzzers for "${pattern}".`);
  }
  if (matches.length > 1) {
    throw new FuzzerError("INVALID_ARGUMENT", `Multiple fuzzers match "${pattern}".`, {
      matches: matches.map((t) => `${t.package}/${t.executable}`),
    });
  }
  return matches[0];
}

/**
 * Create a fuzzer for `target` on `device` and apply `settings`.
 *
 * @throws FuzzerError if a setting is invalid (bad option key, missing output directory).
 */
export async function createFuzzer(
  device: Device,
  target: FuzzTarget,
  settings: FuzzerSettings = {},
  options: { outputRoot?: string; pollIntervalMs?: number; logger?: Logger } = {}
): Promise<Fuzzer> {
  const fuzzer = new Fuzzer(device, target.package, target.executable, options);

  if (settings.libfuzzerOpts) {
    for (const key of Object.keys(settings.libfuzzerOpts)) {
      if (!OPTION_KEY.test(key)) {
        throw new FuzzerError("INVALID_ARGUMENT", `Invalid libFuzzer option: "${key}".`);
      }
    }
    fuzzer.libfuzzerOpts = { ...settings.libfuzzerOpts };
  }
  if (settings.libfuzzerInputs) fuzzer.libfuzzerInputs = [...settings.libfuzzerInputs];
  if (settings.subprocessArgs) fuzzer.subprocessArgs = [...settings.subprocessArgs];
  if (settings.output !== undefined) await fuzzer.setOutput(settings.output);
  fuzzer.foreground = settings.foreground ?? false;
  fuzzer.debug = settings.debug ?? false;

  return fuzzer;
}
