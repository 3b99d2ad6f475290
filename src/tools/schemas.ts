import { z } from "zod/v4";

/**
 * Shared Zod schemas for rfuzz MCP tool inputs and outputs.
 */

/**
 * Wraps a Zod schema to accept either the expected type OR a JSON string
 * that parses to the expected type. Some MCP clients serialize array and
 * object parameters as strings.
 *
 * @param schema - The Zod schema to wrap
 * @param fieldName - Optional field name for debug logging
 */
export function withJsonStringFallback<T extends z.ZodTypeAny>(
  schema: T,
  fieldName?: string
) {
  return z.preprocess((val) => {
    if (typeof val === "string") {
      try {
        const parsed: unknown = JSON.parse(val);
        if (process.env.RFUZZ_DEBUG_JSON_FALLBACK) {
          console.warn(
            `[rfuzz] JSON string fallback triggered${fieldName ? ` for '${fieldName}'` : ""}: ` +
            `received string, parsed to ${typeof parsed}`
          );
        }
        return parsed;
      } catch {
        // Not JSON: let Zod report the type mismatch.
        return val;
      }
    }
    return val;
  }, schema);
}

export const zNonEmptyString = z
  .string()
  .min(1, "Must be a non-empty string")
  .describe("A non-empty string.");

export const zDeviceAddress = zNonEmptyString.describe(
  "Network address of the target device. Defaults to `device.address` from config.json."
);

export const zFuzzerName = zNonEmptyString.describe(
  "Fuzzer name pattern: `package/executable`, or a substring of either. Must resolve to exactly one fuzzer."
);

export const zLibfuzzerOpts = z
  .record(z.string(), z.string())
  .describe("libFuzzer options without the leading dash, e.g. {\"max_len\": \"4096\", \"runs\": \"100000\"}.");

export const zStringList = z.array(zNonEmptyString);

/**
 * rfuzz standardized tool result envelopes (success + error).
 */
export const zRfuzzErrorCode = z
  .enum(["INVALID_ARGUMENT", "NOT_FOUND", "CONFLICT", "UNAVAILABLE", "TIMEOUT", "INTERNAL"])
  .describe("Stable machine-readable error code.");

export const zRfuzzToolError = z
  .object({
    code: zRfuzzErrorCode,
    message: zNonEmptyString.describe("Human-readable error message."),
    tool: zNonEmptyString.describe("Tool name that produced this error."),
    retryable: z.boolean().optional().describe("Whether a retry may succeed."),
    details: z.record(z.string(), z.unknown()).optional().describe("Structured details for triage."),
    suggestion: zNonEmptyString.optional().describe("What the operator can do about it."),
  })
  .describe("Standard rfuzz tool error envelope.");

/**
 * Object-shaped envelope for tool outputs. The MCP SDK validates output
 * schemas as objects, so success and failure share one shape.
 *
 * @param dataSchema - Schema for the tool-specific success payload.
 */
export function zRfuzzToolResult<T extends z.ZodTypeAny>(dataSchema: T) {
  return z
    .object({
      ok: z.boolean().describe("True on success; false on failure."),
      data: dataSchema.optional().describe("Success payload when ok=true."),
      error: zRfuzzToolError.optional().describe("Error payload when ok=false."),
    })
    .passthrough()
    .describe("Standard rfuzz tool result envelope.");
}

export const zFuzzTarget = z
  .object({
    package: zNonEmptyString,
    executable: zNonEmptyString,
  })
  .describe("A fuzz target as named by the build.");

export const zFuzzerState = z
  .enum(["stopped", "running-foreground", "running-background"])
  .describe("Fuzzer lifecycle state.");

export const zCorpusStats = z
  .object({
    count: z.number().int().nonnegative().describe("Number of corpus inputs on the device."),
    bytes: z.number().int().nonnegative().describe("Total corpus size in bytes."),
  })
  .describe("On-device corpus size.");

/**
 * Tool output schemas (public contract).
 */
export const zOutFuzzersList = zRfuzzToolResult(
  z.object({
    fuzzers: z.array(zFuzzTarget),
  })
);

export const zOutFuzzerStatus = zRfuzzToolResult(
  z.object({
    fuzzer: zNonEmptyString,
    device: zNonEmptyString,
    running: z.boolean(),
    pid: z.number().int().optional().describe("Device process ID when running."),
    corpus: zCorpusStats,
    artifacts: z.array(zNonEmptyString).describe("Saved test units (crash-*, leak-*, ...) in the data namespace."),
    output: zNonEmptyString.describe("Host directory receiving logs and artifacts."),
  })
);

export const zOutFuzzerStart = zRfuzzToolResult(
  z.object({
    fuzzer: zNonEmptyString,
    state: zFuzzerState,
    output: zNonEmptyString,
  })
);

export const zOutFuzzerMonitor = zRfuzzToolResult(
  z.object({
    fuzzer: zNonEmptyString,
    logs: z.number().int().nonnegative().describe("Number of job logs retrieved and symbolized."),
    artifacts: z.array(zNonEmptyString),
    output: zNonEmptyString,
  })
);

export const zOutFuzzerStop = zRfuzzToolResult(
  z.object({
    fuzzer: zNonEmptyString,
    stopped: z.boolean().describe("False when the fuzzer was not running."),
  })
);

export const zOutFuzzerRepro = zRfuzzToolResult(
  z.object({
    fuzzer: zNonEmptyString,
    units: z.array(zNonEmptyString).describe("Device-relative paths of the units that were run."),
    output: zNonEmptyString,
  })
);

export const zOutFuzzerAnalyze = zRfuzzToolResult(
  z.object({
    fuzzer: zNonEmptyString,
    corpus: zCorpusStats,
    output: zNonEmptyString,
  })
);

export const zOutDeviceProcesses = zRfuzzToolResult(
  z.object({
    device: zNonEmptyString,
    processes: z.array(
      zFuzzTarget.extend({
        pid: z.number().int().positive(),
      })
    ),
  })
);
