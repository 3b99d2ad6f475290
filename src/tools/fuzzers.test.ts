import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Logger } from "../logger.js";
import { FakeCommandRunner } from "../testing/fakeCommandRunner.js";
import { isStatus, makeCheckout, makeTempDir, testConfig } from "../testing/fixtures.js";
import { ToolContext } from "./context.js";
import { rfuzzDeviceProcesses } from "./devices.js";
import { rfuzzFuzzerRepro, rfuzzFuzzerStart, rfuzzFuzzerStatus, rfuzzFuzzerStop, rfuzzFuzzersList } from "./fuzzers.js";

const MANIFEST = [
  { fuzzers_package: "foo_fuzzers", fuzzers: ["bar_fuzzer"] },
  { fuzzers_package: "baz_fuzzers", fuzzers: ["qux_fuzzer"] },
];
const RUNNING = "  bar_fuzzer.cmx[111]: fuchsia-pkg://fuchsia.com/foo_fuzzers#meta/bar_fuzzer.cmx";

let root: string;
let runner: FakeCommandRunner;
let ctx: ToolContext;

beforeEach(async () => {
  root = await makeTempDir();
  runner = new FakeCommandRunner();
  ctx = new ToolContext(testConfig(root), runner, new Logger("error", () => undefined));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("rfuzz_fuzzers_list", () => {
  it("lists matching fuzzers", async () => {
    await makeCheckout(root, MANIFEST);
    const result = await rfuzzFuzzersList(ctx, { pattern: "foo" });
    expect(result.structuredContent).toEqual({
      ok: true,
      data: { fuzzers: [{ package: "foo_fuzzers", executable: "bar_fuzzer" }] },
    });
  });

  it("reports a broken checkout and recovers once it is fixed", async () => {
    const first = await rfuzzFuzzersList(ctx, {});
    expect(first.structuredContent).toMatchObject({
      ok: false,
      error: { code: "INVALID_ARGUMENT", tool: "rfuzz_fuzzers_list" },
    });

    await makeCheckout(root, MANIFEST);
    const second = await rfuzzFuzzersList(ctx, {});
    expect(second.structuredContent).toMatchObject({ ok: true });
  });
});

describe("fuzzer tools", () => {
  beforeEach(async () => {
    await makeCheckout(root, MANIFEST);
  });

  it("reports status", async () => {
    runner.on(isStatus, { stdout: RUNNING });
    const result = await rfuzzFuzzerStatus(ctx, { fuzzer: "bar" });
    expect(result.structuredContent).toMatchObject({
      ok: true,
      data: {
        fuzzer: "foo_fuzzers/bar_fuzzer",
        device: "::1",
        running: true,
        pid: 111,
        corpus: { count: 0, bytes: 0 },
        artifacts: [],
      },
    });
  });

  it("maps a running fuzzer to CONFLICT", async () => {
    runner.on(isStatus, { stdout: RUNNING });
    const result = await rfuzzFuzzerStart(ctx, { fuzzer: "foo_fuzzers/bar_fuzzer" });
    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "CONFLICT", tool: "rfuzz_fuzzer_start" },
    });
  });

  it("stops nothing when the fuzzer is idle", async () => {
    const result = await rfuzzFuzzerStop(ctx, { fuzzer: "qux" });
    expect(result.structuredContent).toEqual({
      ok: true,
      data: { fuzzer: "baz_fuzzers/qux_fuzzer", stopped: false },
    });
  });

  it("rejects a repro without units", async () => {
    const result = await rfuzzFuzzerRepro(ctx, { fuzzer: "qux", units: [] });
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "INVALID_ARGUMENT", message: "No units provided." },
    });
    expect(runner.calls).toHaveLength(0);
  });

  it("reports an unknown fuzzer", async () => {
    const result = await rfuzzFuzzerStop(ctx, { fuzzer: "nope" });
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "NOT_FOUND", message: 'No matching fuzzers for "nope".' },
    });
  });

  it("reports an unreachable device as retryable", async () => {
    runner.on(isStatus, { exitCode: 255 });
    const result = await rfuzzFuzzerStop(ctx, { fuzzer: "qux", device_id: "10.0.0.9" });
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: "UNAVAILABLE", retryable: true },
    });
    expect(runner.commands()).toEqual(["ssh 10.0.0.9 cs"]);
  });
});

describe("rfuzz_device_processes", () => {
  it("re-reads the process table by default", async () => {
    await makeCheckout(root, MANIFEST);
    runner.on(isStatus, { stdout: RUNNING });

    await rfuzzDeviceProcesses(ctx, {});
    const result = await rfuzzDeviceProcesses(ctx, {});
    expect(result.structuredContent).toEqual({
      ok: true,
      data: { device: "::1", processes: [{ package: "foo_fuzzers", executable: "bar_fuzzer", pid: 111 }] },
    });
    expect(runner.calls.filter((call) => isStatus(call.argv))).toHaveLength(2);

    await rfuzzDeviceProcesses(ctx, { refresh: false });
    expect(runner.calls.filter((call) => isStatus(call.argv))).toHaveLength(2);
  });
});
