import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { isRecord } from "./utils.js";

/**
 * Minimal subset of `package.json` metadata that we treat as authoritative at runtime.
 */
export interface RfuzzPackageMeta {
  /** Package name (from `package.json`). */
  name: string;
  /** Package version (from `package.json`). */
  version: string;
}

/**
 * Project root, resolved from this file's location rather than the cwd.
 */
function getProjectRootDir(): string {
  const thisFile = fileURLToPath(import.meta.url);
  const thisDir = path.dirname(thisFile);
  // dist/meta.js at runtime, src/meta.ts under test
  return path.resolve(thisDir, "..");
}

/**
 * Load authoritative server metadata from `package.json`.
 *
 * The MCP server info reports this version, so it always matches the
 * installed build.
 *
 * @throws If `package.json` is missing or malformed.
 */
export function loadPackageMeta(): RfuzzPackageMeta {
  const projectRoot = getProjectRootDir();
  const packageJsonPath = path.join(projectRoot, "package.json");

  const raw = fs.readFileSync(packageJsonPath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Invalid package.json: expected JSON object at ${packageJsonPath}`);
  }

  const name = parsed.name;
  const version = parsed.version;

  if (typeof name !== "string" || name.trim().length === 0) {
    throw new Error(`Invalid package.json: expected non-empty string name at ${packageJsonPath}`);
  }
  if (typeof version !== "string" || version.trim().length === 0) {
    throw new Error(`Invalid package.json: expected non-empty string version at ${packageJsonPath}`);
  }

  return { name, version };
}

