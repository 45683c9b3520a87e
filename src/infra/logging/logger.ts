import pino, { Logger } from "pino";

// stdout is reserved for the MCP stdio transport, so logs go to stderr.
const logger = pino(
  {
    name: "persona-section-ranker",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);

// Children copy the level at creation, so setLogLevel has to reach them too.
const componentLoggers: Logger[] = [];

export function createComponentLogger(
  component: string,
  extra?: Record<string, unknown>,
): Logger {
  const child = logger.child({ component, ...extra });
  componentLoggers.push(child);
  return child;
}

export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
}

export default logger;
