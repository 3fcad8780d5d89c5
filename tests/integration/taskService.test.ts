import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { shouldSkip } from "../../src/application/skipDetection";
import {
  cancelTask,
  createDirectoryTasks,
  createTask,
  deleteTask,
  failOrphanedTasks,
  getTask,
  getTaskStats,
  listTaskLogs,
  listTasks,
  pauseAllTasks,
  processTask,
  retryTask
} from "../../src/application/taskService";
import type { TaskRunContext } from "../../src/application/taskQueue";
import { InvalidTaskTransitionError, TaskInputError, TaskNotFoundError, TaskSkippedError } from "../../src/domain/errors";
import { LocalStorage } from "../../src/infrastructure/storage/localStorage";
import { FakeContainer, createTestContext, srtOf } from "../helpers/fakes";
import type { TestContext } from "../helpers/fakes";

class UnreadableContainer extends FakeContainer {
  async listSubtitleTracks(): Promise<never> {
    throw new Error("ffprobe not found");
  }
}

class VanishingStorage extends LocalStorage {
  constructor(private readonly gone: string) {
    super();
  }

  async exists(filePath: string) {
    return filePath === this.gone ? false : super.exists(filePath);
  }
}

function runContext() {
  const progress: number[] = [];
  const context: TaskRunContext = {
    signal: new AbortController().signal,
    reportProgress: async (value) => {
      progress.push(value);
    }
  };
  return { context, progress };
}

async function captureError(promise: Promise<unknown>) {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

describe("task service", () => {
  let dir: string;
  let ctx: TestContext;
  let contexts: TestContext[] = [];

  const setup = (env: Record<string, string> = {}, container?: FakeContainer) => {
    ctx = createTestContext({ TEMP_DIR: path.join(dir, ".work"), ...env }, container);
    contexts.push(ctx);
  };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "tasks-"));
    setup();
  });

  afterEach(async () => {
    for (const context of contexts) {
      context.database.close();
    }
    contexts = [];
    await fs.rm(dir, { recursive: true, force: true });
  });

  const writeSource = async (name: string, lines = ["Hello", "Goodbye"]) => {
    const filePath = path.join(dir, name);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, name.endsWith(".srt") ? srtOf(lines) : "");
    return filePath;
  };

  describe("createTask", () => {
    it("queues a supported file and announces it", async () => {
      const source = await writeSource("ep.srt");
      const task = await createTask({ filePath: source }, ctx.deps);
      expect(task).toMatchObject({
        filePath: source,
        fileName: "ep.srt",
        status: "pending",
        targetLanguage: "Chinese",
        provider: "openai",
        subtitleTrack: null
      });
      expect(ctx.events.created).toEqual([task.id]);
      expect(ctx.logger.messages("info")).toEqual([`Task queued for ${source} -> Chinese.`]);
    });

    it("validates the input file", async () => {
      await expect(createTask({ filePath: path.join(dir, "missing.srt") }, ctx.deps)).rejects.toThrow(
        `File not found: ${path.join(dir, "missing.srt")}`
      );
      const notes = await writeSource("notes.txt");
      await expect(createTask({ filePath: notes }, ctx.deps)).rejects.toBeInstanceOf(TaskInputError);
    });

    it("accepts only known providers", async () => {
      const source = await writeSource("ep.srt");
      await expect(createTask({ filePath: source, provider: "no-such-llm" }, ctx.deps)).rejects.toBeInstanceOf(
        TaskInputError
      );
      expect((await getTaskStats(ctx.deps)).total).toBe(0);

      const task = await createTask({ filePath: source, provider: " Claude " }, ctx.deps);
      expect(task.provider).toBe("claude");
    });

    it("reports why a duplicate is skipped", async () => {
      const source = await writeSource("ep.srt");
      const first = await createTask({ filePath: source }, ctx.deps);
      const error = await captureError(createTask({ filePath: source }, ctx.deps));
      expect(error).toBeInstanceOf(TaskSkippedError);
      expect(error instanceof TaskSkippedError ? error.reason : null).toBe(
        `Task already exists (id=${first.id}, status=pending)`
      );
    });

    it("skips existing sidecars unless forced", async () => {
      const source = await writeSource("ep.srt");
      await writeSource("ep.zh-Hans.srt");
      await expect(createTask({ filePath: source }, ctx.deps)).rejects.toThrow(
        `Skipped: Output file already exists: ${path.join(dir, "ep.zh-Hans.srt")}`
      );
      const forced = await createTask({ filePath: source, forceOverride: true }, ctx.deps);
      expect(forced.forceOverride).toBe(true);
    });

    it("skips containers that already carry the target language", async () => {
      setup({}, new FakeContainer([{ index: 0, codec: "subrip", language: "chi", title: null }], ""));
      const movie = await writeSource("movie.mkv");
      await expect(createTask({ filePath: movie, subtitleTrack: 0 }, ctx.deps)).rejects.toThrow(
        "Skipped: File already has Chinese subtitle track"
      );
    });

    it("proceeds with a warning when a container cannot be inspected", async () => {
      setup({}, new UnreadableContainer([], ""));
      const movie = await writeSource("movie.mkv");
      const task = await createTask({ filePath: movie, subtitleTrack: 2 }, ctx.deps);
      expect(task.subtitleTrack).toBe(2);
      expect(ctx.logger.entries.filter((entry) => entry.level === "warn")).toEqual([
        { level: "warn", scope: "guard", message: `Could not inspect ${movie}: ffprobe not found` }
      ]);
    });

    it("leaves state untouched when only asking the guard", async () => {
      const source = await writeSource("ep.srt");
      const first = await shouldSkip(source, "Chinese", false, ctx.deps);
      const second = await shouldSkip(source, "Chinese", false, ctx.deps);
      expect(first).toEqual({ skip: false, reason: null });
      expect(second).toEqual(first);
      expect((await getTaskStats(ctx.deps)).total).toBe(0);
    });
  });

  it("creates tasks for a directory and lists what it skipped", async () => {
    const a = await writeSource("a.srt");
    const b = await writeSource("b.srt");
    await writeSource("b.zh-Hans.srt");
    await writeSource("notes.txt");
    const movie = await writeSource("sub/c.mkv");

    const result = await createDirectoryTasks({ directoryPath: dir }, ctx.deps);
    expect(result.created.map((task) => task.filePath)).toEqual([a, movie]);
    expect(result.skipped).toEqual([
      { filePath: b, reason: `Output file already exists: ${path.join(dir, "b.zh-Hans.srt")}` }
    ]);

    await expect(createDirectoryTasks({ directoryPath: path.join(dir, "nope") }, ctx.deps)).rejects.toThrow(
      "Directory not found"
    );
  });

  it("keeps going when a file disappears during a directory run", async () => {
    const a = await writeSource("a.srt");
    const b = await writeSource("b.srt");
    const deps = { ...ctx.deps, storage: new VanishingStorage(a) };

    const result = await createDirectoryTasks({ directoryPath: dir }, deps);

    expect(result.created.map((task) => task.filePath)).toEqual([b]);
    expect(result.skipped).toEqual([{ filePath: a, reason: `File not found: ${a}` }]);
    expect(ctx.logger.messages("warn")).toContain(`Not queued ${a}: File not found: ${a}`);
  });

  describe("lifecycle", () => {
    it("cancels, retries and deletes pending tasks", async () => {
      const task = await createTask({ filePath: await writeSource("ep.srt") }, ctx.deps);
      await cancelTask(task.id, ctx.deps);
      expect((await getTask(task.id, ctx.deps)).status).toBe("cancelled");
      await expect(cancelTask(task.id, ctx.deps)).rejects.toThrow(
        `Task ${task.id} cannot move from cancelled to cancelled`
      );

      const retried = await retryTask(task.id, ctx.deps);
      expect(retried.status).toBe("pending");
      await expect(retryTask(task.id, ctx.deps)).rejects.toBeInstanceOf(InvalidTaskTransitionError);

      expect(await deleteTask(task.id, ctx.deps)).toEqual({ taskId: task.id, action: "deleted" });
      await expect(getTask(task.id, ctx.deps)).rejects.toBeInstanceOf(TaskNotFoundError);
      expect(ctx.events.statuses).toEqual([
        [task.id, "cancelled"],
        [task.id, "pending"]
      ]);
    });

    it("cancels instead of deleting a running task", async () => {
      const task = await createTask({ filePath: await writeSource("ep.srt") }, ctx.deps);
      await ctx.deps.tasks.claimNextPending();
      expect(await deleteTask(task.id, ctx.deps)).toEqual({ taskId: task.id, action: "cancelled" });
      expect((await getTask(task.id, ctx.deps)).status).toBe("cancelled");
    });

    it("will not retry into a second active task for the same file", async () => {
      const source = await writeSource("ep.srt");
      const first = await createTask({ filePath: source }, ctx.deps);
      await cancelTask(first.id, ctx.deps);
      await createTask({ filePath: source }, ctx.deps);

      await expect(retryTask(first.id, ctx.deps)).rejects.toThrow(
        `Task ${first.id} cannot move from cancelled to pending`
      );
      expect((await listTasks({ status: "pending" }, ctx.deps)).total).toBe(1);
    });

    it("pauses pending work and counts by status", async () => {
      await createTask({ filePath: await writeSource("a.srt") }, ctx.deps);
      await createTask({ filePath: await writeSource("b.srt") }, ctx.deps);
      await ctx.deps.tasks.claimNextPending();
      expect(await pauseAllTasks(ctx.deps)).toEqual({ paused: 1 });
      expect(await getTaskStats(ctx.deps)).toEqual({
        pending: 0,
        processing: 1,
        completed: 0,
        failed: 0,
        cancelled: 0,
        paused: 1,
        total: 2
      });
    });

    it("fails tasks interrupted by a previous run", async () => {
      const task = await createTask({ filePath: await writeSource("ep.srt") }, ctx.deps);
      await ctx.deps.tasks.claimNextPending();
      expect(await failOrphanedTasks(ctx.deps)).toEqual([task.id]);
      expect((await getTask(task.id, ctx.deps)).errorMessage).toBe(
        "Interrupted before completion; retry to run it again"
      );
      expect(ctx.events.statuses).toEqual([[task.id, "failed"]]);
    });

    it("reads back stored task logs", async () => {
      const task = await createTask({ filePath: await writeSource("ep.srt") }, ctx.deps);
      await ctx.deps.logs.append({ scope: `task-${task.id}`, level: "info", message: "started", createdAt: new Date() });
      expect((await listTaskLogs(task.id, ctx.deps)).map((entry) => entry.message)).toEqual(["started"]);
      await expect(listTaskLogs(9999, ctx.deps)).rejects.toBeInstanceOf(TaskNotFoundError);
    });
  });

  describe("processTask", () => {
    it("translates a subtitle task and records the output", async () => {
      const source = await writeSource("ep.srt");
      const task = await createTask({ filePath: source }, ctx.deps);
      await ctx.deps.tasks.claimNextPending();
      const { context, progress } = runContext();

      await processTask(task.id, context, ctx.deps);

      const output = path.join(dir, "ep.zh-Hans.srt");
      expect(await fs.readFile(output, "utf-8")).toContain("[Chinese] Goodbye");
      expect((await ctx.deps.translatedFiles.find(source, "Chinese"))?.outputPath).toBe(output);
      expect(progress[progress.length - 1]).toBe(100);
      expect(ctx.providers.requested).toEqual(["openai"]);
    });

    it("applies stored settings at run time", async () => {
      const source = await writeSource("ep.srt");
      const task = await createTask({ filePath: source }, ctx.deps);
      await ctx.deps.settingsStore.setMany({ subtitle_output_format: "ass", bilingual_output: "true" });
      await ctx.deps.tasks.claimNextPending();

      await processTask(task.id, runContext().context, ctx.deps);

      const content = await fs.readFile(path.join(dir, "ep.zh-Hans.ass"), "utf-8");
      expect(content.split("\n")).toContain(
        "Dialogue: 0,0:00:00.00,0:00:01.00,Default,,0,0,0,,[Chinese] Hello\\N{\\fs16}Hello{\\r}"
      );
    });

    it("completes without writing when the output appeared after queueing", async () => {
      setup({ SUBTITLE_OUTPUT_FORMAT: "srt" });
      const source = await writeSource("ep.srt");
      const task = await createTask({ filePath: source }, ctx.deps);
      const sidecar = await writeSource("ep.zh-Hans.srt", ["Existing"]);
      await ctx.deps.tasks.claimNextPending();
      const { context, progress } = runContext();

      await processTask(task.id, context, ctx.deps);

      expect(progress).toEqual([100]);
      expect(await fs.readFile(sidecar, "utf-8")).toContain("Existing");
      expect(await ctx.deps.translatedFiles.find(source, "Chinese")).toBeNull();
      expect(ctx.logger.messages("info")).toContain(`Skipped: Output file already exists: ${sidecar}`);
    });

    it("does not record output for a task cancelled mid-run", async () => {
      const source = await writeSource("ep.srt");
      const task = await createTask({ filePath: source }, ctx.deps);
      await ctx.deps.tasks.claimNextPending();
      await ctx.deps.tasks.cancelTask(task.id);

      await processTask(task.id, runContext().context, ctx.deps);

      expect(await ctx.deps.translatedFiles.find(source, "Chinese")).toBeNull();
      expect(ctx.logger.messages("info")).toContain("Task was cancelled; output not recorded.");
    });

    it("translates a container into a translated copy", async () => {
      setup({}, new FakeContainer([{ index: 3, codec: "ass", language: "eng", title: null }], srtOf(["Hello"])));
      const movie = await writeSource("movie.mkv");
      const task = await createTask({ filePath: movie }, ctx.deps);
      await ctx.deps.tasks.claimNextPending();

      await processTask(task.id, runContext().context, ctx.deps);

      expect(ctx.container.extracted).toEqual([{ filePath: movie, trackIndex: 3 }]);
      expect((await ctx.deps.translatedFiles.find(movie, "Chinese"))?.outputPath).toBe(
        path.join(dir, "movie.translated.mkv")
      );
    });

    it("logs and rethrows pipeline errors", async () => {
      setup({}, new FakeContainer([], ""));
      const movie = await writeSource("movie.mkv");
      const task = await createTask({ filePath: movie }, ctx.deps);
      await ctx.deps.tasks.claimNextPending();

      await expect(processTask(task.id, runContext().context, ctx.deps)).rejects.toThrow(
        "No subtitle tracks found in the file"
      );
      expect(ctx.logger.messages("error")).toEqual(["No subtitle tracks found in the file"]);
    });
  });
});
