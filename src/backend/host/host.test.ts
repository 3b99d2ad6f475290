import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FakeCommandRunner } from "../../testing/fakeCommandRunner.js";
import { SYMBOLIZER, makeCheckout, makeTempDir, testConfig, testHost, writeFiles } from "../../testing/fixtures.js";
import { Host, HostError } from "./host.js";

let root: string;

beforeEach(async () => {
  root = await makeTempDir();
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("Host.create", () => {
  it("derives tool paths from the checkout", async () => {
    await makeCheckout(root);
    const host = await Host.create(testConfig(root), new FakeCommandRunner());
    expect(host.paths).toEqual({
      sourceRoot: root,
      buildDir: path.join(root, "out/default"),
      symbolizerExec: path.join(root, "out/default/host_x64/symbolize"),
      llvmSymbolizer: path.join(root, "prebuilt/third_party/clang/linux-x64/bin/llvm-symbolizer"),
      buildIdDirs: [path.join(root, "out/default/.build-id")],
    });
  });

  it("rejects a missing build directory", async () => {
    await expect(Host.create(testConfig(root), new FakeCommandRunner())).rejects.toMatchObject({
      code: "INVALID_ARGUMENT",
      message: `Invalid build directory: ${path.join(root, "out/default")}`,
    });
  });

  it("requires at least one build ID directory", async () => {
    await makeCheckout(root);
    await fs.rm(path.join(root, "out/default/.build-id"), { recursive: true });
    await expect(Host.create(testConfig(root), new FakeCommandRunner())).rejects.toMatchObject({
      code: "NOT_FOUND",
      message: "No build ID directories found.",
    });
  });
});

describe("Host.fxpath", () => {
  it("anchors relative paths under the source root", () => {
    const host = testHost(new FakeCommandRunner(), root);
    expect(host.fxpath("out", "default")).toBe(path.join(root, "out/default"));
    expect(host.fxpath("/abs/path")).toBe("/abs/path");
  });

  it("is idempotent", () => {
    const host = testHost(new FakeCommandRunner(), root);
    const once = host.fxpath("local/foo");
    expect(host.fxpath(once)).toBe(once);
  });
});

describe("Host.readFuzzerManifest", () => {
  it("flattens and sorts the catalog", async () => {
    await writeFiles(root, {
      "out/default/fuzzers.json": JSON.stringify([
        { fuzzers_package: "foo_fuzzers", fuzzers: ["zeta_fuzzer", "alpha_fuzzer"] },
        { fuzzers_package: "bar_fuzzers", fuzzers: ["one_fuzzer"] },
      ]),
    });
    const host = testHost(new FakeCommandRunner(), root);
    expect(await host.readFuzzerManifest()).toEqual([
      { package: "bar_fuzzers", executable: "one_fuzzer" },
      { package: "foo_fuzzers", executable: "alpha_fuzzer" },
      { package: "foo_fuzzers", executable: "zeta_fuzzer" },
    ]);
  });

  it("reports a missing manifest", async () => {
    const host = testHost(new FakeCommandRunner(), root);
    await expect(host.readFuzzerManifest()).rejects.toMatchObject({ code: "NOT_FOUND" });
  });

  it("rejects records of the wrong shape", async () => {
    await writeFiles(root, { "custom.json": JSON.stringify([{ fuzzers_package: "foo", fuzzers: "bar" }]) });
    const host = testHost(new FakeCommandRunner(), root);
    const err = await host.readFuzzerManifest("custom.json").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HostError);
    expect(err).toMatchObject({ code: "INVALID_ARGUMENT", message: `Malformed fuzzer manifest: ${path.join(root, "custom.json")}` });
  });
});

describe("Host.matchFuzzers", () => {
  it("matches by substring on package and executable", async () => {
    await writeFiles(root, {
      "out/default/fuzzers.json": JSON.stringify([
        { fuzzers_package: "foo_fuzzers", fuzzers: ["parse_fuzzer", "decode_fuzzer"] },
        { fuzzers_package: "bar_fuzzers", fuzzers: ["parse_fuzzer"] },
      ]),
    });
    const host = testHost(new FakeCommandRunner(), root);
    await host.readFuzzerManifest();

    expect(host.matchFuzzers()).toHaveLength(3);
    expect(host.matchFuzzers("decode")).toEqual([{ package: "foo_fuzzers", executable: "decode_fuzzer" }]);
    expect(host.matchFuzzers("bar/parse")).toEqual([{ package: "bar_fuzzers", executable: "parse_fuzzer" }]);
    expect(host.matchFuzzers("bar/decode")).toEqual([]);
  });
});

describe("Host.symbolize", () => {
  it("feeds the raw log to the symbolizer and strips kernel log prefixes", async () => {
    const runner = new FakeCommandRunner().on(SYMBOLIZER, {
      stdout: "[00012.345][klog] INFO: #0 0x1234 in main foo.cc:12\n",
    });
    const host = testHost(runner, root);

    expect(await host.symbolize("raw log")).toBe("#0 0x1234 in main foo.cc:12\n");
    expect(runner.calls).toEqual([
      {
        kind: "exec",
        argv: [
          SYMBOLIZER,
          "-ids-rel",
          "-llvm-symbolizer",
          "/toolchain/llvm-symbolizer",
          "-build-id-dir",
          "/toolchain/.build-id",
        ],
        input: "raw log",
      },
    ]);
  });

  it("returns an empty string when the symbolizer fails", async () => {
    const runner = new FakeCommandRunner().on(SYMBOLIZER, { exitCode: 1, stdout: "partial" });
    expect(await testHost(runner, root).symbolize("raw log")).toBe("");
  });
});
