/**
 * Terminal logger for rfuzz-mcp.
 *
 * ANSI-colored, leveled output on stderr. stdout is reserved for MCP traffic,
 * so everything here (including echoed fuzzer output) goes to stderr.
 */

/** ANSI escape codes for colors and styles. */
const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",

  cyan: "\x1b[36m",
  magenta: "\x1b[35m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  blue: "\x1b[34m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
} as const;

/** Box-drawing characters for structured output. */
const BOX = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
} as const;

/** Log level type (matches config schema). */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Sink for interactive fuzzer output (foreground runs echo their log here).
 */
export interface Display {
  echo(text: string): void;
}

/** A display that discards everything. */
export const silentDisplay: Display = {
  echo: () => undefined,
};

function renderBanner(): string {
  return [
    `${ANSI.green}${ANSI.bold}` + "  ┏┓┏┓┳┳┏┓┏┓",
    "  ┛ ┣ ┃┃┏┛┏┛",
    "    ┻ ┗┛┗┛┗┛" + `${ANSI.reset}`,
  ].join("\n");
}

/**
 * Strip ANSI escape codes from a string to get its display length.
 */
function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Render a boxed section with a title in the top border.
 */
function renderBox(title: string, content: string[], color: string = ANSI.cyan): string {
  const lines: string[] = [];

  // Content lines render as "│ <content><pad> │", so the inner width must fit
  // the widest line plus its two padding spaces.
  const titleText = ` ${title} `;
  const maxContentLen = content.reduce((max, line) => Math.max(max, stripAnsi(line).length), 0);
  const innerWidth = Math.max(maxContentLen + 2, titleText.length + 2);

  lines.push(
    `${color}${BOX.topLeft}${BOX.horizontal}${ANSI.bold}${titleText}${ANSI.reset}${color}${BOX.horizontal.repeat(innerWidth - titleText.length - 1)}${BOX.topRight}${ANSI.reset}`
  );

  for (const line of content) {
    const padding = Math.max(0, innerWidth - (stripAnsi(line).length + 2));
    lines.push(
      `${color}${BOX.vertical}${ANSI.reset} ${line}${" ".repeat(padding)} ${color}${BOX.vertical}${ANSI.reset}`
    );
  }

  lines.push(
    `${color}${BOX.bottomLeft}${BOX.horizontal.repeat(innerWidth)}${BOX.bottomRight}${ANSI.reset}`
  );

  return lines.join("\n");
}

function formatTimestamp(): string {
  const now = new Date();
  const h = String(now.getHours()).padStart(2, "0");
  const m = String(now.getMinutes()).padStart(2, "0");
  const s = String(now.getSeconds()).padStart(2, "0");
  const ms = String(now.getMilliseconds()).padStart(3, "0");
  return `${ANSI.dim}${ANSI.gray}${h}:${m}:${s}.${ms}${ANSI.reset}`;
}

function getLevelIndicator(level: LogLevel): string {
  switch (level) {
    case "debug":
      return `${ANSI.dim}${ANSI.blue}[DEBUG]${ANSI.reset}`;
    case "info":
      return `${ANSI.cyan}[INFO ]${ANSI.reset}`;
    case "warn":
      return `${ANSI.yellow}[WARN ]${ANSI.reset}`;
    case "error":
      return `${ANSI.red}[ERROR]${ANSI.reset}`;
  }
}

/**
 * Logger instance with configurable minimum level.
 */
export class Logger implements Display {
  private minLevel: LogLevel;
  private readonly out: (text: string) => void;

  constructor(minLevel: LogLevel = "info", out: (text: string) => void = (text) => process.stderr.write(text)) {
    this.minLevel = minLevel;
    this.out = out;
  }

  /**
   * Print the startup banner with the resolved environment.
   */
  printBanner(info: { transport: string; sourceRoot: string; buildDir: string; device?: string }): void {
    const output: string[] = [];

    output.push("");
    output.push(renderBanner());
    output.push("");

    const configLines = [
      `${ANSI.cyan}transport${ANSI.reset}    ${ANSI.white}${info.transport}${ANSI.reset}`,
      `${ANSI.cyan}source-root${ANSI.reset}  ${ANSI.dim}${info.sourceRoot}${ANSI.reset}`,
      `${ANSI.cyan}build-dir${ANSI.reset}    ${ANSI.dim}${info.buildDir}${ANSI.reset}`,
      `${ANSI.cyan}device${ANSI.reset}       ${info.device ? `${ANSI.white}${info.device}` : `${ANSI.yellow}<unset>`}${ANSI.reset}`,
    ];
    output.push(renderBox("ENVIRONMENT", configLines, ANSI.green));
    output.push("");
    output.push(`  ${ANSI.green}${ANSI.bold}◆${ANSI.reset} ${ANSI.green}Server ready${ANSI.reset} ${ANSI.dim}(listening on stdio)${ANSI.reset}`);
    output.push("");

    this.out(output.join("\n"));
  }

  /**
   * Write fuzzer output verbatim, regardless of level.
   */
  echo(text: string): void {
    this.out(text.endsWith("\n") ? text : `${text}\n`);
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const parts = [
      formatTimestamp(),
      getLevelIndicator(level),
      message,
    ];

    if (meta && Object.keys(meta).length > 0) {
      parts.push(
        `${ANSI.dim}${JSON.stringify(meta)}${ANSI.reset}`
      );
    }

    this.out(parts.join(" ") + "\n");
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }
}
