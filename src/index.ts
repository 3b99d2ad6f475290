import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, resolveSourceRoot } from "./config.js";
import { Logger } from "./logger.js";
import { loadPackageMeta } from "./meta.js";
import { NodeCommandRunner } from "./backend/command/command.js";
import { ToolContext } from "./tools/context.js";
import { registerTools } from "./tools/register.js";

/**
 * MCP server entrypoint.
 *
 * Hosts the rfuzz MCP server: loads config.json, builds the shared tool
 * context and serves the tools over stdio.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const pkg = loadPackageMeta();
  const logger = new Logger(config.logLevel);

  const server = new McpServer({ name: "rfuzz", version: pkg.version });
  const ctx = new ToolContext(config, new NodeCommandRunner(), logger);

  // IMPORTANT: tools must be registered before connecting to a transport, since
  // registration mutates server capabilities and request handlers.
  registerTools(server, ctx);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.printBanner({
    transport: config.transport,
    sourceRoot: resolveSourceRoot(config),
    buildDir: config.buildDir,
    device: config.device.address,
  });
}

main().catch((err) => {
  const msg = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  process.stderr.write(`[rfuzz-mcp] fatal ${msg}\n`);
  process.exitCode = 1;
});
