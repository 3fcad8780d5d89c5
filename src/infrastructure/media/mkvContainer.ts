import { z } from "zod";
import { ExternalToolError, StructuralInputError } from "../../domain/errors";
import { isImageSubtitle } from "../../domain/tracks";
import type { SubtitleTrack } from "../../domain/types";
import type { ContainerPort } from "../../interfaces/ports";
import { runCommand, summarizeOutput } from "./commandRunner";
import type { CommandRunner } from "./commandRunner";

export type MediaToolPaths = {
  ffprobe: string;
  ffmpeg: string;
  mkvmerge: string;
};

const DEFAULT_TOOLS: MediaToolPaths = { ffprobe: "ffprobe", ffmpeg: "ffmpeg", mkvmerge: "mkvmerge" };

const ffprobeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        index: z.number().int(),
        codec_name: z.string().optional(),
        tags: z.record(z.string()).optional()
      })
    )
    .default([])
});

/** Subtitle stream inspection/extraction through ffprobe and ffmpeg, muxing through mkvmerge. */
export class MkvContainer implements ContainerPort {
  constructor(
    private readonly run: CommandRunner = runCommand,
    private readonly tools: MediaToolPaths = DEFAULT_TOOLS
  ) {}

  async listSubtitleTracks(filePath: string, signal?: AbortSignal): Promise<SubtitleTrack[]> {
    const args = ["-v", "quiet", "-print_format", "json", "-show_streams", "-select_streams", "s", filePath];
    const result = await this.run(this.tools.ffprobe, args, { signal });
    if (result.code !== 0) {
      throw new ExternalToolError(
        "ffprobe",
        result.code,
        `ffprobe failed (exit ${result.code ?? "unknown"}).`,
        summarizeOutput(result.stderr)
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout || "{}");
    } catch {
      throw new ExternalToolError("ffprobe", result.code, "ffprobe returned invalid JSON.", summarizeOutput(result.stdout));
    }
    const parsed = ffprobeOutputSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExternalToolError("ffprobe", result.code, "ffprobe returned an unexpected stream listing.");
    }

    return parsed.data.streams.map((stream) => {
      const tags = new Map(Object.entries(stream.tags ?? {}).map(([key, value]) => [key.toLowerCase(), value]));
      return {
        index: stream.index,
        codec: stream.codec_name ?? "unknown",
        language: tags.get("language") ?? null,
        title: tags.get("title") ?? null
      };
    });
  }

  async extractSubtitle(options: { filePath: string; trackIndex: number; outputPath: string; signal?: AbortSignal }) {
    const tracks = await this.listSubtitleTracks(options.filePath, options.signal);
    // ffmpeg addresses subtitle streams by their position among subtitle streams, not the global index.
    const position = tracks.findIndex((track) => track.index === options.trackIndex);
    if (position < 0) {
      throw new StructuralInputError(`Subtitle track ${options.trackIndex} not found`);
    }
    const track = tracks[position];
    if (isImageSubtitle(track)) {
      throw new StructuralInputError(
        `Subtitle track ${options.trackIndex} is a graphical subtitle (${track.codec}), text extraction not supported`
      );
    }

    const args = ["-y", "-v", "error", "-i", options.filePath, "-map", `0:s:${position}`, "-c:s", "srt", options.outputPath];
    const result = await this.run(this.tools.ffmpeg, args, { signal: options.signal });
    if (result.code !== 0) {
      throw new ExternalToolError("ffmpeg", result.code, `ffmpeg exited with code ${result.code ?? "unknown"}`, result.stderr);
    }
    return options.outputPath;
  }

  async muxSubtitle(options: {
    containerPath: string;
    subtitlePath: string;
    outputPath: string;
    languageCode: string;
    trackName: string;
    signal?: AbortSignal;
  }) {
    const args = [
      "-o",
      options.outputPath,
      options.containerPath,
      "--language",
      `0:${options.languageCode}`,
      "--track-name",
      `0:${options.trackName}`,
      options.subtitlePath
    ];
    const result = await this.run(this.tools.mkvmerge, args, { signal: options.signal });
    // mkvmerge exits with 1 when it only emitted warnings.
    if (result.code !== 0 && result.code !== 1) {
      throw new ExternalToolError(
        "mkvmerge",
        result.code,
        `mkvmerge exited with code ${result.code ?? "unknown"}`,
        result.stderr || result.stdout.trim()
      );
    }
    return options.outputPath;
  }
}

/** Names of the required tools that cannot be started. */
export async function findMissingTools(run: CommandRunner = runCommand, tools: MediaToolPaths = DEFAULT_TOOLS) {
  const checks: Array<[string, string[]]> = [
    [tools.ffmpeg, ["-version"]],
    [tools.ffprobe, ["-version"]],
    [tools.mkvmerge, ["--version"]]
  ];
  const missing: string[] = [];
  for (const [command, args] of checks) {
    try {
      await run(command, args);
    } catch {
      missing.push(command);
    }
  }
  return missing;
}
