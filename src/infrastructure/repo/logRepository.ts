import { desc, eq } from "drizzle-orm";
import type { TaskLogEntry } from "../../domain/types";
import type { LogStorePort } from "../../interfaces/ports";
import type { AppDatabase } from "./database";
import { taskLogs } from "./schema";

export class SqliteLogStore implements LogStorePort {
  constructor(private readonly db: AppDatabase) {}

  async append(entry: TaskLogEntry) {
    this.db.insert(taskLogs).values(entry).run();
  }

  /** Latest `limit` entries for a scope, oldest first. */
  async list(scope: string, limit: number): Promise<TaskLogEntry[]> {
    const rows = this.db
      .select()
      .from(taskLogs)
      .where(eq(taskLogs.scope, scope))
      .orderBy(desc(taskLogs.id))
      .limit(limit)
      .all();
    return rows.reverse().map((row) => ({
      scope: row.scope,
      level: row.level,
      message: row.message,
      createdAt: row.createdAt
    }));
  }
}
