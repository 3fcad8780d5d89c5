import { and, eq } from "drizzle-orm";
import type { TranslatedFileRecord } from "../../domain/types";
import type { TranslatedFileRepositoryPort } from "../../interfaces/ports";
import type { AppDatabase } from "./database";
import { translatedFiles } from "./schema";

export class SqliteTranslatedFileRepository implements TranslatedFileRepositoryPort {
  constructor(private readonly db: AppDatabase) {}

  async find(filePath: string, targetLanguage: string): Promise<TranslatedFileRecord | null> {
    const row = this.db
      .select()
      .from(translatedFiles)
      .where(and(eq(translatedFiles.filePath, filePath), eq(translatedFiles.targetLanguage, targetLanguage)))
      .get();
    if (!row) {
      return null;
    }
    return {
      filePath: row.filePath,
      targetLanguage: row.targetLanguage,
      outputPath: row.outputPath,
      translatedAt: row.translatedAt
    };
  }

  async upsert(record: { filePath: string; targetLanguage: string; outputPath: string }) {
    const translatedAt = new Date();
    this.db
      .insert(translatedFiles)
      .values({ ...record, translatedAt })
      .onConflictDoUpdate({
        target: [translatedFiles.filePath, translatedFiles.targetLanguage],
        set: { outputPath: record.outputPath, translatedAt }
      })
      .run();
  }
}
