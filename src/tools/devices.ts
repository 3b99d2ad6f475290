import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ToolContext } from "./context.js";
import { toolErrFrom, toolOk } from "./result.js";

/**
 * `rfuzz_device_processes` - the device's component process table.
 *
 * The table is cached per device; `refresh` (default true) re-reads it.
 */
export async function rfuzzDeviceProcesses(
  ctx: ToolContext,
  args: { device_id?: string; refresh?: boolean }
): Promise<CallToolResult> {
  const tool = "rfuzz_device_processes";
  try {
    const device = await ctx.device(args.device_id);
    if (args.refresh ?? true) {
      await device.refresh();
    }
    const processes = await device.processes();
    return toolOk({ device: device.address, processes });
  } catch (err) {
    return toolErrFrom(tool, err);
  }
}
