import type { SettingsStorePort } from "../../interfaces/ports";
import type { AppDatabase } from "./database";
import { appSettings } from "./schema";

export class SqliteSettingsStore implements SettingsStorePort {
  constructor(private readonly db: AppDatabase) {}

  async getAll() {
    const rows = this.db.select().from(appSettings).all();
    return Object.fromEntries(rows.map((row) => [row.key, row.value]));
  }

  async setMany(entries: Record<string, string>) {
    this.db.transaction((tx) => {
      for (const [key, value] of Object.entries(entries)) {
        tx.insert(appSettings).values({ key, value }).onConflictDoUpdate({ target: appSettings.key, set: { value } }).run();
      }
    });
  }
}
