import { pino, type Logger } from "pino";

const root = pino(
  {
    name: "provenant",
    level: process.env.PROVENANT_LOG_LEVEL ?? "info",
    base: { pid: process.pid },
  },
  process.stderr,
);

const children = new Map<string, Logger>();

/** Module-scoped child logger. Output goes to stderr so stdout stays free for command results. */
export function getLogger(module: string): Logger {
  const existing = children.get(module);
  if (existing) return existing;
  const child = root.child({ module });
  children.set(module, child);
  return child;
}

/** Change the level of the root logger and every module logger handed out so far. */
export function setLogLevel(level: string): void {
  root.level = level;
  for (const child of children.values()) child.level = level;
}
