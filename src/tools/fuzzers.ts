import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ToolContext } from "./context.js";
import { toolErrFrom, toolOk } from "./result.js";

interface FuzzerArgs {
  fuzzer: string;
  device_id?: string;
}

interface RunArgs extends FuzzerArgs {
  debug?: boolean;
  libfuzzer_opts?: Record<string, string>;
  subprocess_args?: string[];
  output?: string;
}

/**
 * `rfuzz_fuzzers_list` - list fuzz targets known to the build.
 */
export async function rfuzzFuzzersList(ctx: ToolContext, args: { pattern?: string }): Promise<CallToolResult> {
  const tool = "rfuzz_fuzzers_list";
  try {
    const host = await ctx.host();
    await host.readFuzzerManifest();
    const fuzzers = host.matchFuzzers(args.pattern ?? "").map((t) => ({ package: t.package, executable: t.executable }));
    return toolOk({ fuzzers });
  } catch (err) {
    return toolErrFrom(tool, err);
  }
}

/**
 * `rfuzz_fuzzer_status` - running state, corpus size and saved artifacts.
 */
export async function rfuzzFuzzerStatus(
  ctx: ToolContext,
  args: FuzzerArgs & { refresh?: boolean }
): Promise<CallToolResult> {
  const tool = "rfuzz_fuzzer_status";
  try {
    const fuzzer = await ctx.fuzzer(args.fuzzer, args.device_id);
    const running = await fuzzer.isRunning(args.refresh ?? true);
    const corpus = await fuzzer.measureCorpus();
    const artifacts = await fuzzer.listArtifacts();
    return toolOk({
      fuzzer: String(fuzzer),
      device: fuzzer.device.address,
      running,
      pid: running ? fuzzer.processId : undefined,
      corpus,
      artifacts,
      output: fuzzer.output,
    });
  } catch (err) {
    return toolErrFrom(tool, err);
  }
}

/**
 * `rfuzz_fuzzer_start` - start fuzzing, in the background unless `foreground` is set.
 */
export async function rfuzzFuzzerStart(
  ctx: ToolContext,
  args: RunArgs & { foreground?: boolean }
): Promise<CallToolResult> {
  const tool = "rfuzz_fuzzer_start";
  try {
    const fuzzer = await ctx.fuzzer(args.fuzzer, args.device_id, {
      libfuzzerOpts: args.libfuzzer_opts,
      subprocessArgs: args.subprocess_args,
      output: args.output,
      foreground: args.foreground,
      debug: args.debug,
    });
    await fuzzer.start();
    return toolOk({ fuzzer: String(fuzzer), state: fuzzer.state, output: fuzzer.output });
  } catch (err) {
    return toolErrFrom(tool, err);
  }
}

/**
 * `rfuzz_fuzzer_monitor` - wait for a background run and collect its logs.
 *
 * Monitors of the same fuzzer on the same device run one after the other;
 * the second one finds no logs left and returns `logs: 0`.
 */
export async function rfuzzFuzzerMonitor(
  ctx: ToolContext,
  args: FuzzerArgs & { output?: string }
): Promise<CallToolResult> {
  const tool = "rfuzz_fuzzer_monitor";
  try {
    const fuzzer = await ctx.fuzzer(args.fuzzer, args.device_id, { output: args.output });
    const logs = await ctx.monitors.withLock(ctx.sessionKey(fuzzer), () => fuzzer.monitor());
    const artifacts = await fuzzer.listArtifacts();
    ctx.logger.info("Fuzzer finished", { fuzzer: String(fuzzer), logs, artifacts: artifacts.length });
    return toolOk({ fuzzer: String(fuzzer), logs, artifacts, output: fuzzer.output });
  } catch (err) {
    return toolErrFrom(tool, err);
  }
}

/**
 * `rfuzz_fuzzer_stop` - kill a running fuzzer.
 */
export async function rfuzzFuzzerStop(ctx: ToolContext, args: FuzzerArgs): Promise<CallToolResult> {
  const tool = "rfuzz_fuzzer_stop";
  try {
    const fuzzer = await ctx.fuzzer(args.fuzzer, args.device_id);
    const stopped = await fuzzer.stop();
    return toolOk({ fuzzer: String(fuzzer), stopped });
  } catch (err) {
    return toolErrFrom(tool, err);
  }
}

/**
 * `rfuzz_fuzzer_repro` - re-run saved test units in the foreground.
 */
export async function rfuzzFuzzerRepro(
  ctx: ToolContext,
  args: RunArgs & { units: string[] }
): Promise<CallToolResult> {
  const tool = "rfuzz_fuzzer_repro";
  try {
    const fuzzer = await ctx.fuzzer(args.fuzzer, args.device_id, {
      libfuzzerOpts: args.libfuzzer_opts,
      libfuzzerInputs: args.units,
      subprocessArgs: args.subprocess_args,
      output: args.output,
      debug: args.debug,
    });
    await fuzzer.repro();
    return toolOk({ fuzzer: String(fuzzer), units: fuzzer.libfuzzerInputs, output: fuzzer.output });
  } catch (err) {
    return toolErrFrom(tool, err);
  }
}

/**
 * `rfuzz_fuzzer_analyze` - merge extra corpora and report coverage.
 */
export async function rfuzzFuzzerAnalyze(
  ctx: ToolContext,
  args: RunArgs & { corpora?: string[] }
): Promise<CallToolResult> {
  const tool = "rfuzz_fuzzer_analyze";
  try {
    const fuzzer = await ctx.fuzzer(args.fuzzer, args.device_id, {
      libfuzzerOpts: args.libfuzzer_opts,
      subprocessArgs: args.subprocess_args,
      output: args.output,
      debug: args.debug,
    });
    await fuzzer.analyze(args.corpora ?? []);
    const corpus = await fuzzer.measureCorpus();
    return toolOk({ fuzzer: String(fuzzer), corpus, output: fuzzer.output });
  } catch (err) {
    return toolErrFrom(tool, err);
  }
}
