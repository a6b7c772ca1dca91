import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  name: "registry-harvester",
  level: process.env.LOG_LEVEL ?? "info"
});

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
