import { integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { TASK_STATUSES } from "../../domain/types";

export const tasks = sqliteTable("tasks", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  filePath: text("file_path").notNull(),
  fileName: text("file_name").notNull(),
  status: text("status", { enum: TASK_STATUSES }).notNull().default("pending"),
  progress: integer("progress").notNull().default(0),
  sourceLanguage: text("source_language"),
  targetLanguage: text("target_language").notNull(),
  provider: text("llm_provider").notNull(),
  subtitleTrack: integer("subtitle_track"),
  forceOverride: integer("force_override", { mode: "boolean" }).notNull().default(false),
  errorMessage: text("error_message"),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull(),
  completedAt: integer("completed_at", { mode: "timestamp_ms" })
});

export const watchers = sqliteTable("watchers", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  path: text("path").notNull().unique(),
  enabled: integer("enabled", { mode: "boolean" }).notNull().default(true),
  targetLanguage: text("target_language").notNull(),
  provider: text("llm_provider").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull()
});

export const translatedFiles = sqliteTable(
  "translated_files",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    filePath: text("file_path").notNull(),
    targetLanguage: text("target_language").notNull(),
    outputPath: text("output_path").notNull(),
    translatedAt: integer("translated_at", { mode: "timestamp_ms" }).notNull()
  },
  (table) => ({
    fileLanguage: uniqueIndex("translated_files_file_language").on(table.filePath, table.targetLanguage)
  })
);

export const appSettings = sqliteTable("app_settings", {
  key: text("key").primaryKey(),
  value: text("value").notNull()
});

export const taskLogs = sqliteTable("task_logs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  scope: text("scope").notNull(),
  level: text("level", { enum: ["info", "warn", "error"] }).notNull(),
  message: text("message").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull()
});
