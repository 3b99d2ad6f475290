import type { RfuzzConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type { CommandRunner } from "../backend/command/command.js";
import type { Device } from "../backend/device/device.js";
import { createDevice, createFuzzer, resolveFuzzer, type FuzzerSettings } from "../backend/fuzzer/factory.js";
import type { Fuzzer } from "../backend/fuzzer/fuzzer.js";
import { Host } from "../backend/host/host.js";
import { KeyedLock } from "../utils.js";

/**
 * Shared state for tool handlers: one Host per server, one Device per
 * address. Devices are reused so their process-table cache survives between
 * calls; fuzzers are built fresh for every call.
 */
export class ToolContext {
  /** Serializes monitors of the same fuzzer on the same device. */
  public readonly monitors = new KeyedLock();
  private hostPromise: Promise<Host> | null = null;
  private readonly devices = new Map<string, Device>();

  public constructor(
    public readonly config: RfuzzConfig,
    public readonly runner: CommandRunner,
    public readonly logger: Logger
  ) {}

  public host(): Promise<Host> {
    if (!this.hostPromise) {
      this.hostPromise = Host.create(this.config, this.runner, { logger: this.logger, display: this.logger });
      // A failed configuration is retried on the next call rather than cached.
      this.hostPromise.catch(() => {
        this.hostPromise = null;
      });
    }
    return this.hostPromise;
  }

  public async device(address?: string): Promise<Device> {
    const host = await this.host();
    const key = address ?? this.config.device.address ?? "";
    let device = this.devices.get(key);
    if (!device) {
      device = createDevice(host, this.config, address, this.logger);
      this.devices.set(key, device);
    }
    return device;
  }

  /**
   * Resolve `pattern` to one fuzz target and build a fuzzer for it.
   */
  public async fuzzer(pattern: string, address?: string, settings: FuzzerSettings = {}): Promise<Fuzzer> {
    const host = await this.host();
    await host.readFuzzerManifest();
    const target = resolveFuzzer(host, pattern);
    const device = await this.device(address);
    return createFuzzer(device, target, settings, {
      outputRoot: this.config.outputDir ? host.fxpath(this.config.outputDir) : undefined,
      pollIntervalMs: this.config.pollIntervalMs,
      logger: this.logger,
    });
  }

  /** Identity of a monitoring session: one per fuzzer per device. */
  public sessionKey(fuzzer: Fuzzer): string {
    return `${fuzzer.device.address}/${fuzzer.package}/${fuzzer.executable}`;
  }
}
