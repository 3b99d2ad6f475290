import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod/v4";
import type { ToolContext } from "./context.js";
import { rfuzzDeviceProcesses } from "./devices.js";
import {
  rfuzzFuzzerAnalyze,
  rfuzzFuzzerMonitor,
  rfuzzFuzzerRepro,
  rfuzzFuzzerStart,
  rfuzzFuzzerStatus,
  rfuzzFuzzerStop,
  rfuzzFuzzersList,
} from "./fuzzers.js";
import {
  withJsonStringFallback,
  zDeviceAddress,
  zFuzzerName,
  zLibfuzzerOpts,
  zNonEmptyString,
  zOutDeviceProcesses,
  zOutFuzzerAnalyze,
  zOutFuzzerMonitor,
  zOutFuzzerRepro,
  zOutFuzzerStart,
  zOutFuzzerStatus,
  zOutFuzzerStop,
  zOutFuzzersList,
  zStringList,
} from "./schemas.js";

/**
 * Register the MCP tool surface for rfuzz.
 *
 * Every handler goes through `ctx`, which owns the host, the per-address
 * devices and the monitor locks.
 */
export function registerTools(server: McpServer, ctx: ToolContext): void {
  registerFuzzerTools(server, ctx);
  registerRunTools(server, ctx);
  registerDeviceTools(server, ctx);
}

/** Inputs shared by the tools that launch a fuzzer run. */
const runInputs = {
  fuzzer: zFuzzerName,
  device_id: zDeviceAddress.optional(),
  libfuzzer_opts: withJsonStringFallback(zLibfuzzerOpts, "libfuzzer_opts").optional(),
  subprocess_args: withJsonStringFallback(zStringList, "subprocess_args")
    .optional()
    .describe("Arguments passed to the fuzzer process after `--`."),
  output: zNonEmptyString
    .optional()
    .describe("Existing host directory for logs and artifacts. Defaults to `<outputDir>/<package>_<executable>`."),
  debug: z
    .boolean()
    .optional()
    .describe("Disable libFuzzer's signal handlers (handle_segv=0, ...) so a debugger can attach."),
};

function registerFuzzerTools(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    "rfuzz_fuzzers_list",
    {
      title: "List fuzzers",
      description:
        "Lists the fuzz targets the build produced, read from `fuzzers.json` in the build directory. Each entry is a `package` and an `executable`; " +
        "refer to a fuzzer as `package/executable` in the other tools. `pattern` filters by substring: `foo` matches any package or executable containing it, `foo/bar` requires both parts to match.",
      inputSchema: {
        pattern: z.string().optional().describe("Substring filter; `pkg/exe` matches each part separately."),
      },
      outputSchema: zOutFuzzersList,
    },
    async (args) => rfuzzFuzzersList(ctx, args)
  );

  server.registerTool(
    "rfuzz_fuzzer_status",
    {
      title: "Get fuzzer status",
      description:
        "Reports whether a fuzzer is running on the device (and its pid), the size of its on-device corpus, and the saved test units (crash-*, leak-*, oom-*, timeout-*, ...) in its data directory. " +
        "Pass `refresh=false` to reuse the device's cached process table.",
      inputSchema: {
        fuzzer: zFuzzerName,
        device_id: zDeviceAddress.optional(),
        refresh: z.boolean().optional().describe("Re-read the device process table (default true)."),
      },
      outputSchema: zOutFuzzerStatus,
    },
    async (args) => rfuzzFuzzerStatus(ctx, args)
  );
}

function registerRunTools(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    "rfuzz_fuzzer_start",
    {
      title: "Start fuzzing",
      description:
        "Starts a fuzzer on the device against its on-device corpus. By default it runs in the background with `-jobs=1` and this tool returns once it is launched; " +
        "follow up with `rfuzz_fuzzer_monitor` to wait for it and collect symbolized logs and artifacts. With `foreground=true` the call blocks until the fuzzer exits and its output is echoed to the server's stderr. " +
        "Fails with CONFLICT if the fuzzer is already running.",
      inputSchema: {
        ...runInputs,
        foreground: z.boolean().optional().describe("Block until the fuzzer exits (default false)."),
      },
      outputSchema: zOutFuzzerStart,
    },
    async (args) => rfuzzFuzzerStart(ctx, args)
  );

  server.registerTool(
    "rfuzz_fuzzer_monitor",
    {
      title: "Wait for fuzzer and collect logs",
      description:
        "Waits until a background fuzzer run finishes, then copies its job logs off the device, symbolizes them into `fuzz-<timestamp>-<job>.log` in the output directory " +
        "(with `fuzz-latest.log` pointing at the newest), and fetches every artifact the logs announce. Works from a fresh session: state is read from the device. " +
        "Returns `logs: 0` when there was nothing to collect.",
      inputSchema: {
        fuzzer: zFuzzerName,
        device_id: zDeviceAddress.optional(),
        output: runInputs.output,
      },
      outputSchema: zOutFuzzerMonitor,
    },
    async (args) => rfuzzFuzzerMonitor(ctx, args)
  );

  server.registerTool(
    "rfuzz_fuzzer_stop",
    {
      title: "Stop fuzzer",
      description: "Kills a running fuzzer on the device. Returns `stopped: false` if it was not running.",
      inputSchema: {
        fuzzer: zFuzzerName,
        device_id: zDeviceAddress.optional(),
      },
      outputSchema: zOutFuzzerStop,
    },
    async (args) => rfuzzFuzzerStop(ctx, args)
  );

  server.registerTool(
    "rfuzz_fuzzer_repro",
    {
      title: "Reproduce test units",
      description:
        "Copies host test units (paths or globs, e.g. a crash-* artifact from an earlier run) into the fuzzer's data directory and runs the fuzzer over them in the foreground. " +
        "Fails with INVALID_ARGUMENT when `units` is empty and NOT_FOUND when a pattern matches no file.",
      inputSchema: {
        ...runInputs,
        units: withJsonStringFallback(zStringList.min(1), "units").describe("Host paths or globs of the units to run."),
      },
      outputSchema: zOutFuzzerRepro,
    },
    async (args) => rfuzzFuzzerRepro(ctx, args)
  );

  server.registerTool(
    "rfuzz_fuzzer_analyze",
    {
      title: "Analyze corpus coverage",
      description:
        "Adds host corpora (paths or globs) to the fuzzer's on-device corpus, then runs the fuzzer once over the whole corpus with `-runs=0 -print_coverage=1 -print_final_stats=1`. " +
        "The coverage report is written to the symbolized log in the output directory.",
      inputSchema: {
        ...runInputs,
        corpora: withJsonStringFallback(zStringList, "corpora")
          .optional()
          .describe("Host paths or globs of extra corpus inputs."),
      },
      outputSchema: zOutFuzzerAnalyze,
    },
    async (args) => rfuzzFuzzerAnalyze(ctx, args)
  );
}

function registerDeviceTools(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    "rfuzz_device_processes",
    {
      title: "List component processes",
      description:
        "Lists the components running on the device (`package`, `executable`, `pid`), as reported by the device's component status command. " +
        "Useful to check for stray fuzzers before starting a new run.",
      inputSchema: {
        device_id: zDeviceAddress.optional(),
        refresh: z.boolean().optional().describe("Re-read the table instead of using the cached one (default true)."),
      },
      outputSchema: zOutDeviceProcesses,
    },
    async (args) => rfuzzDeviceProcesses(ctx, args)
  );
}
