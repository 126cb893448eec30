export type LogLevel = "debug" | "info" | "warn" | "error" | "event";

/**
 * Leveled logger. Writes to stderr: stdout belongs to the MCP transport
 * and to CLI output.
 */
export function log(level: LogLevel, msg: string): void {
  if (level === "debug" && !process.env.EVOMEMORY_DEBUG) return;
  const ts = new Date().toISOString().slice(11, 19);
  const prefix =
    level === "event" ? "\x1b[36m+\x1b[0m" :
    level === "warn"  ? "\x1b[33m!\x1b[0m" :
    level === "error" ? "\x1b[31mx\x1b[0m" :
    level === "debug" ? "\x1b[90m.\x1b[0m" :
                        "\x1b[90m>\x1b[0m";
  console.error(`${ts} ${prefix} ${msg}`);
}
