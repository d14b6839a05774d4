import util from "node:util";
import { ConfigurationManager } from "./config.js";
import type { LogConfig, LogData } from "./types.js";

export class Logger {
  constructor(private config: LogConfig) {}

  isEnabled(id: string): boolean {
    if (!this.config.enabled) return false;
    if (this.config.deniedIds.has(id)) return false;
    if (this.config.allowedIds.size > 0 && !this.config.allowedIds.has(id)) {
      return false;
    }
    return true;
  }

  log(id: string, data: LogData | (() => LogData)): void {
    if (!this.isEnabled(id)) return;

    const out = typeof data === "function" ? data() : data;

    if (typeof out === "string") {
      console.log(`[${id}] ${out}`);
    } else {
      console.log(
        `[${id}]`,
        util.inspect(out, {
          depth: null,
          colors: true,
        }),
      );
    }
  }
}

let defaultLoggerInstance: Logger | null = null;

export function getDefaultLogger(): Logger {
  if (!defaultLoggerInstance) {
    defaultLoggerInstance = new Logger(
      ConfigurationManager.createDefault().logging,
    );
  }
  return defaultLoggerInstance;
}
