import { asc, eq } from "drizzle-orm";
import type { WatcherRecord } from "../../domain/types";
import type { WatcherRepositoryPort } from "../../interfaces/ports";
import type { AppDatabase } from "./database";
import { watchers } from "./schema";

type WatcherRow = typeof watchers.$inferSelect;

const toWatcherRecord = (row: WatcherRow): WatcherRecord => ({
  id: row.id,
  path: row.path,
  enabled: row.enabled,
  targetLanguage: row.targetLanguage,
  provider: row.provider,
  createdAt: row.createdAt
});

export class SqliteWatcherRepository implements WatcherRepositoryPort {
  constructor(private readonly db: AppDatabase) {}

  async createWatcher(input: { path: string; targetLanguage: string; provider: string }) {
    const row = this.db
      .insert(watchers)
      .values({ ...input, enabled: true, createdAt: new Date() })
      .returning()
      .get();
    return toWatcherRecord(row);
  }

  async getWatcher(watcherId: number) {
    const row = this.db.select().from(watchers).where(eq(watchers.id, watcherId)).get();
    return row ? toWatcherRecord(row) : null;
  }

  async findByPath(path: string) {
    const row = this.db.select().from(watchers).where(eq(watchers.path, path)).get();
    return row ? toWatcherRecord(row) : null;
  }

  async listWatchers(options: { enabledOnly?: boolean } = {}) {
    const rows = this.db
      .select()
      .from(watchers)
      .where(options.enabledOnly ? eq(watchers.enabled, true) : undefined)
      .orderBy(asc(watchers.id))
      .all();
    return rows.map(toWatcherRecord);
  }

  async setEnabled(watcherId: number, enabled: boolean) {
    const row = this.db.update(watchers).set({ enabled }).where(eq(watchers.id, watcherId)).returning().get();
    return row ? toWatcherRecord(row) : null;
  }

  async deleteWatcher(watcherId: number) {
    return this.db.delete(watchers).where(eq(watchers.id, watcherId)).run().changes > 0;
  }
}
