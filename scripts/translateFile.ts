import path from "node:path";
import { loadSettings, normalizeOutputSettings } from "../src/config/settings";
import { isContainerFile, isSubtitleFile, sidecarPath } from "../src/application/outputPaths";
import { resolveSubtitleFormat, translateContainer, translateSubtitleFile } from "../src/application/translationPipeline";
import { LocalLogger } from "../src/infrastructure/logger/localLogger";
import { MkvContainer } from "../src/infrastructure/media/mkvContainer";
import { ProviderFactory } from "../src/infrastructure/providers/providerFactory";
import { LocalStorage } from "../src/infrastructure/storage/localStorage";
import { SubtitleService } from "../src/infrastructure/subtitles/subtitles";

// Usage examples:
//  - npx tsx scripts/translateFile.ts --file=./media/episode01.srt --target=Chinese
//  - npx tsx scripts/translateFile.ts --file=./media/movie.mkv --provider=claude --format=ass --bilingual

function parseArgs() {
  const args = process.argv.slice(2);
  const opts: Record<string, string | boolean> = {};
  for (const arg of args) {
    const m = arg.match(/^--([^=]+)(=(.*))?$/);
    if (m) {
      opts[m[1]] = m[3] ?? true;
    }
  }
  return opts;
}

function stringArg(value: string | boolean | undefined) {
  return typeof value === "string" ? value : undefined;
}

async function main() {
  const settings = loadSettings();
  const args = parseArgs();
  const file = stringArg(args.file);
  if (!file) {
    console.error("Provide --file=<path to .mkv, .srt or .ass>");
    process.exit(1);
  }

  const filePath = path.resolve(file);
  const targetLanguage = stringArg(args.target) ?? settings.targetLanguage;
  const output = normalizeOutputSettings(
    stringArg(args.format) ?? settings.subtitleOutputFormat,
    args.overwrite === true || settings.overwriteMkv
  );
  const bilingual = args.bilingual === true || settings.bilingualOutput;
  const provider = new ProviderFactory().create(stringArg(args.provider) ?? settings.defaultProvider, settings);
  const deps = {
    container: new MkvContainer(),
    subtitles: new SubtitleService(),
    storage: new LocalStorage(),
    logger: new LocalLogger(path.resolve(settings.logsDir)),
    tempDir: path.resolve(settings.tempDir)
  };
  const track = stringArg(args.track);
  const onProgress = (progress: number) => {
    console.log(`Progress: ${progress}%`);
  };

  let outputPath: string;
  if (isSubtitleFile(filePath)) {
    const format = resolveSubtitleFormat(output.subtitleOutputFormat, filePath);
    outputPath = await translateSubtitleFile(
      {
        sourcePath: filePath,
        outputPath: sidecarPath(filePath, targetLanguage, format),
        provider,
        sourceLanguage: settings.sourceLanguage,
        targetLanguage,
        bilingual,
        outputFormat: format,
        onProgress,
        logScope: "cli"
      },
      deps
    );
  } else if (isContainerFile(filePath)) {
    outputPath = await translateContainer(
      {
        containerPath: filePath,
        targetLanguage,
        provider,
        trackIndex: track === undefined ? null : Number.parseInt(track, 10),
        sourceLanguage: settings.sourceLanguage,
        bilingual,
        outputFormat: output.subtitleOutputFormat,
        overwrite: output.overwriteMkv,
        onProgress,
        logScope: "cli"
      },
      deps
    );
  } else {
    console.error("File must be an MKV, SRT, or ASS file");
    process.exit(1);
  }

  console.log(`Translation written to ${outputPath}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
