import { promises as fs } from "node:fs";
import path from "node:path";
import type { LogStorePort, LoggerPort } from "../../interfaces/ports";

type LogLevel = "info" | "warn" | "error";

type LogEntry = {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  pid: number;
};

/**
 * Appends JSON lines to `<baseDir>/<scope>.log` and, when a store is given, mirrors
 * each entry into the task_logs table. Write failures are reported on stderr only.
 */
export class LocalLogger implements LoggerPort {
  constructor(
    private baseDir: string,
    private store: LogStorePort | null = null
  ) {}

  async info(scope: string, message: string) {
    await this.append(scope, "info", message);
  }

  async warn(scope: string, message: string) {
    await this.append(scope, "warn", message);
  }

  async error(scope: string, message: string) {
    await this.append(scope, "error", message);
  }

  private async append(scope: string, level: LogLevel, message: string) {
    const now = new Date();
    const entry: LogEntry = {
      timestamp: now.toISOString(),
      level,
      scope,
      message,
      pid: process.pid
    };
    const filePath = path.join(this.baseDir, `${scope}.log`);

    const writes: Promise<unknown>[] = [
      fs.mkdir(this.baseDir, { recursive: true }).then(() => fs.appendFile(filePath, `${JSON.stringify(entry)}\n`))
    ];
    if (this.store) {
      writes.push(this.store.append({ scope, level, message, createdAt: now }));
    }

    const results = await Promise.allSettled(writes);
    for (const result of results) {
      if (result.status === "rejected") {
        console.error("Logger write failed", result.reason);
      }
    }
  }
}
