import { and, asc, count, desc, eq, inArray, ne, sql } from "drizzle-orm";
import { ACTIVE_STATUSES, RETRYABLE_STATUSES } from "../../domain/taskState";
import type { NewTask, TaskRecord, TaskStatus } from "../../domain/types";
import type { TaskRepositoryPort } from "../../interfaces/ports";
import type { AppDatabase } from "./database";
import { tasks } from "./schema";

type TaskRow = typeof tasks.$inferSelect;

const toTaskRecord = (row: TaskRow): TaskRecord => ({
  id: row.id,
  filePath: row.filePath,
  fileName: row.fileName,
  status: row.status,
  progress: row.progress,
  sourceLanguage: row.sourceLanguage,
  targetLanguage: row.targetLanguage,
  provider: row.provider,
  subtitleTrack: row.subtitleTrack,
  forceOverride: row.forceOverride,
  errorMessage: row.errorMessage,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
  completedAt: row.completedAt
});

export class SqliteTaskRepository implements TaskRepositoryPort {
  constructor(private readonly db: AppDatabase) {}

  async createTask(input: NewTask): Promise<TaskRecord | null> {
    return this.db.transaction((tx) => {
      const active = tx
        .select({ id: tasks.id })
        .from(tasks)
        .where(
          and(
            eq(tasks.filePath, input.filePath),
            eq(tasks.targetLanguage, input.targetLanguage),
            inArray(tasks.status, [...ACTIVE_STATUSES])
          )
        )
        .get();
      if (active) {
        return null;
      }
      const now = new Date();
      const row = tx
        .insert(tasks)
        .values({ ...input, status: "pending", progress: 0, createdAt: now, updatedAt: now })
        .returning()
        .get();
      return toTaskRecord(row);
    });
  }

  async getTask(taskId: number): Promise<TaskRecord | null> {
    const row = this.db.select().from(tasks).where(eq(tasks.id, taskId)).get();
    return row ? toTaskRecord(row) : null;
  }

  async findActiveTask(filePath: string, targetLanguage: string): Promise<TaskRecord | null> {
    const row = this.db
      .select()
      .from(tasks)
      .where(
        and(
          eq(tasks.filePath, filePath),
          eq(tasks.targetLanguage, targetLanguage),
          inArray(tasks.status, [...ACTIVE_STATUSES])
        )
      )
      .orderBy(asc(tasks.id))
      .get();
    return row ? toTaskRecord(row) : null;
  }

  async listTasks(options: { status?: TaskStatus; limit: number; offset: number }) {
    const filter = options.status ? eq(tasks.status, options.status) : undefined;
    const rows = this.db
      .select()
      .from(tasks)
      .where(filter)
      .orderBy(desc(tasks.createdAt), desc(tasks.id))
      .limit(options.limit)
      .offset(options.offset)
      .all();
    const totalRow = this.db.select({ total: count() }).from(tasks).where(filter).get();
    return { tasks: rows.map(toTaskRecord), total: totalRow?.total ?? 0 };
  }

  async countByStatus(): Promise<Record<TaskStatus, number>> {
    const counts: Record<TaskStatus, number> = {
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      paused: 0
    };
    const rows = this.db.select({ status: tasks.status, total: count() }).from(tasks).groupBy(tasks.status).all();
    for (const row of rows) {
      counts[row.status] = row.total;
    }
    return counts;
  }

  /**
   * Flips the oldest pending task to processing in a single UPDATE ... RETURNING,
   * so two workers can never receive the same id.
   */
  async claimNextPending(): Promise<number | null> {
    const next = this.db
      .select({ id: tasks.id })
      .from(tasks)
      .where(eq(tasks.status, "pending"))
      .orderBy(asc(tasks.createdAt), asc(tasks.id))
      .limit(1);
    const claimed = this.db
      .update(tasks)
      .set({ status: "processing", updatedAt: new Date() })
      .where(and(eq(tasks.status, "pending"), inArray(tasks.id, next)))
      .returning({ id: tasks.id })
      .all();
    return claimed[0]?.id ?? null;
  }

  async updateProgress(taskId: number, progress: number) {
    const result = this.db
      .update(tasks)
      .set({ progress: sql`max(${tasks.progress}, ${progress})`, updatedAt: new Date() })
      .where(and(eq(tasks.id, taskId), eq(tasks.status, "processing")))
      .run();
    return result.changes > 0;
  }

  async completeTask(taskId: number) {
    const now = new Date();
    const result = this.db
      .update(tasks)
      .set({ status: "completed", progress: 100, completedAt: now, updatedAt: now })
      .where(and(eq(tasks.id, taskId), eq(tasks.status, "processing")))
      .run();
    return result.changes > 0;
  }

  async failTask(taskId: number, message: string) {
    const result = this.db
      .update(tasks)
      .set({ status: "failed", errorMessage: message, updatedAt: new Date() })
      .where(and(eq(tasks.id, taskId), eq(tasks.status, "processing")))
      .run();
    return result.changes > 0;
  }

  async cancelTask(taskId: number) {
    const result = this.db
      .update(tasks)
      .set({ status: "cancelled", updatedAt: new Date() })
      .where(and(eq(tasks.id, taskId), inArray(tasks.status, [...ACTIVE_STATUSES])))
      .run();
    return result.changes > 0;
  }

  /** Processing rows are cancelled in place; every other selected row is removed. */
  async deleteTasks(taskIds: number[] | null) {
    if (taskIds && taskIds.length === 0) {
      return { cancelled: 0, deleted: 0 };
    }
    const selection = taskIds ? inArray(tasks.id, taskIds) : undefined;
    // Delete first: the rows cancelled below must survive the delete.
    return this.db.transaction((tx) => {
      const deleted = tx
        .delete(tasks)
        .where(and(selection, ne(tasks.status, "processing")))
        .run().changes;
      const cancelled = tx
        .update(tasks)
        .set({ status: "cancelled", updatedAt: new Date() })
        .where(and(selection, eq(tasks.status, "processing")))
        .run().changes;
      return { cancelled, deleted };
    });
  }

  async pauseTasks(taskIds: number[] | null) {
    if (taskIds && taskIds.length === 0) {
      return 0;
    }
    const selection = taskIds ? inArray(tasks.id, taskIds) : undefined;
    return this.db
      .update(tasks)
      .set({ status: "paused", updatedAt: new Date() })
      .where(and(selection, eq(tasks.status, "pending")))
      .run().changes;
  }

  /** Re-queues a retryable task unless another task is already active for its file and language. */
  async retryTask(taskId: number) {
    return this.db.transaction((tx) => {
      const task = tx.select().from(tasks).where(eq(tasks.id, taskId)).get();
      if (!task) {
        return false;
      }
      const active = tx
        .select({ id: tasks.id })
        .from(tasks)
        .where(
          and(
            ne(tasks.id, taskId),
            eq(tasks.filePath, task.filePath),
            eq(tasks.targetLanguage, task.targetLanguage),
            inArray(tasks.status, [...ACTIVE_STATUSES])
          )
        )
        .get();
      if (active) {
        return false;
      }
      const result = tx
        .update(tasks)
        .set({ status: "pending", progress: 0, errorMessage: null, completedAt: null, updatedAt: new Date() })
        .where(and(eq(tasks.id, taskId), inArray(tasks.status, [...RETRYABLE_STATUSES])))
        .run();
      return result.changes > 0;
    });
  }

  async failOrphanedTasks(message: string) {
    const rows = this.db
      .update(tasks)
      .set({ status: "failed", errorMessage: message, updatedAt: new Date() })
      .where(eq(tasks.status, "processing"))
      .returning({ id: tasks.id })
      .all();
    return rows.map((row) => row.id);
  }
}
