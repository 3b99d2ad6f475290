import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { CommandError } from "../backend/command/command.js";
import { FuzzerError } from "../backend/fuzzer/fuzzer.js";
import { HostError } from "../backend/host/host.js";

/**
 * Machine-readable error codes for rfuzz tool responses.
 *
 * Keep this list stable once clients depend on it.
 */
export type RfuzzToolErrorCode =
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "CONFLICT"
  | "UNAVAILABLE"
  | "TIMEOUT"
  | "INTERNAL";

/**
 * Standard machine-readable error envelope for all rfuzz tools.
 */
export interface RfuzzToolError {
  /** Stable error code for programmatic branching. */
  code: RfuzzToolErrorCode;
  /** Human-readable message (safe for operator display). */
  message: string;
  /** Tool name that produced the error (e.g., `rfuzz_fuzzer_start`). */
  tool: string;
  /** Whether retrying the exact same request may succeed. */
  retryable?: boolean;
  /** Optional structured details (do not put massive payloads here). */
  details?: Record<string, unknown>;
  /** What the operator can do about it. */
  suggestion?: string;
}

export interface RfuzzToolOk<T> extends Record<string, unknown> {
  ok: true;
  data: T;
}

export interface RfuzzToolFail extends Record<string, unknown> {
  ok: false;
  error: RfuzzToolError;
}

/**
 * Build a successful MCP tool response with both:
 * - `structuredContent` (primary; validated when outputSchema is present)
 * - `content[].text` JSON (fallback for clients that only read text)
 *
 * @param data - Tool-specific success payload.
 */
export function toolOk<T extends Record<string, unknown>>(data: T): CallToolResult {
  const structuredContent: RfuzzToolOk<T> = { ok: true, data };
  return {
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}

/**
 * Build an error MCP tool response. `isError=true` makes MCP clients treat
 * this as a tool failure.
 */
export function toolErr(error: RfuzzToolError): CallToolResult {
  const structuredContent: RfuzzToolFail = { ok: false, error };
  return {
    isError: true,
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}

/**
 * Map any error thrown by the backend to a tool error response.
 */
export function toolErrFrom(tool: string, err: unknown): CallToolResult {
  if (err instanceof CommandError) {
    switch (err.kind) {
      case "missing":
        return toolErr({
          code: "UNAVAILABLE",
          tool,
          message: err.message,
          retryable: false,
          details: err.details,
          suggestion: "Ensure ssh, scp and the configured symbolizer are installed and on PATH",
        });
      case "timeout":
        return toolErr({
          code: "TIMEOUT",
          tool,
          message: err.message,
          retryable: true,
          details: err.details,
          suggestion: "Check that the device is responsive",
        });
      case "failed":
        return toolErr({
          code: "UNAVAILABLE",
          tool,
          message: err.message,
          retryable: true,
          details: err.details,
          suggestion: "Check the device address and that the device is reachable over ssh",
        });
    }
  }

  if (err instanceof FuzzerError) {
    switch (err.code) {
      case "ALREADY_RUNNING":
        return toolErr({
          code: "CONFLICT",
          tool,
          message: err.message,
          retryable: false,
          details: err.details,
          suggestion: "Stop it with rfuzz_fuzzer_stop, or wait for it with rfuzz_fuzzer_monitor",
        });
      case "NO_UNITS":
        return toolErr({
          code: "INVALID_ARGUMENT",
          tool,
          message: err.message,
          retryable: false,
          suggestion: "Pass one or more test unit paths (globs allowed) in `units`",
        });
      case "NOT_FOUND":
        return toolErr({ code: "NOT_FOUND", tool, message: err.message, retryable: false, details: err.details });
      case "INVALID_ARGUMENT":
        return toolErr({ code: "INVALID_ARGUMENT", tool, message: err.message, retryable: false, details: err.details });
    }
  }

  if (err instanceof HostError) {
    return toolErr({
      code: err.code,
      tool,
      message: err.message,
      retryable: false,
      details: err.details,
      suggestion: "Check sourceRoot, buildDir and symbolizer paths in config.json",
    });
  }

  const msg = err instanceof Error ? err.message : String(err);
  return toolErr({ code: "INTERNAL", tool, message: msg, retryable: false });
}
