#!/usr/bin/env node
import { createInterface } from "readline/promises";
import { stdin, stdout } from "process";
import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import {
  type ClipperConfig,
  type ConfigOverrides,
  CROP_MODES,
  type CropMode,
  describeCropMode,
  loadConfig,
} from "./lib/config";
import { loadEnvFile } from "./lib/env";
import { isClipperError, getErrorMessage } from "./lib/errors";
import { createLogger } from "./lib/logger";
import { type RunSummary, buildRunnerDeps, runClipper } from "./runner";
import { getModelSize } from "./services/transcription";
import { extractVideoId } from "./services/youtube";

type Prompt = (question: string) => Promise<string>;

interface CliOptions {
  crop?: string;
  subtitles?: boolean;
  outputDir?: string;
  maxClips?: string;
  minScore?: string;
  maxDuration?: string;
  padding?: string;
  whisperModel?: string;
  yes?: boolean;
  verbose?: boolean;
}

export function parseCropChoice(value: string): CropMode | null {
  const v = value.trim().toLowerCase();
  if (v === "1") return "center";
  if (v === "2") return "split-left";
  if (v === "3") return "split-right";
  return CROP_MODES.find((m) => m === v) ?? null;
}

export function parseYesNo(value: string): boolean {
  return ["y", "yes"].includes(value.trim().toLowerCase());
}

async function askCropMode(ask: Prompt): Promise<CropMode> {
  console.log(chalk.bold("\n=== Crop Mode ==="));
  console.log("1. Default (center crop)");
  console.log("2. Split 1 (top: center, bottom: bottom-left facecam)");
  console.log("3. Split 2 (top: center, bottom: bottom-right facecam)");
  for (;;) {
    const mode = parseCropChoice(await ask("\nSelect crop mode (1-3): "));
    if (mode) {
      return mode;
    }
    console.log(chalk.yellow("Invalid choice. Please enter 1, 2, or 3."));
  }
}

function collectOverrides(options: CliOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.outputDir !== undefined) overrides.OUTPUT_DIR = options.outputDir;
  if (options.maxClips !== undefined) overrides.MAX_CLIPS = options.maxClips;
  if (options.minScore !== undefined) overrides.MIN_SCORE = options.minScore;
  if (options.maxDuration !== undefined) overrides.MAX_DURATION = options.maxDuration;
  if (options.padding !== undefined) overrides.PADDING = options.padding;
  if (options.whisperModel !== undefined) overrides.WHISPER_MODEL = options.whisperModel;
  return overrides;
}

function printSummary(summary: RunSummary, config: Readonly<ClipperConfig>): void {
  console.log(chalk.dim("─".repeat(60)));
  for (const outcome of summary.outcomes) {
    const label = `clip ${outcome.plan.rank}`;
    if (outcome.status === "rendered") {
      const note = outcome.warning ? chalk.yellow(" (no subtitles)") : "";
      console.log(`${chalk.green("✔")} ${label} → ${outcome.outputPath}${note}`);
    } else {
      console.log(`${chalk.red("✖")} ${label} ${outcome.error.kind}: ${outcome.error.message}`);
    }
  }
  console.log(
    `Finished processing. ${summary.rendered} clip(s) successfully saved to '${config.outputDir}'` +
      (summary.failed > 0 ? `, ${summary.failed} failed.` : "."),
  );
}

async function main(argv: string[]): Promise<number> {
  loadEnvFile(".env");
  loadEnvFile(".env.local");

  const program = new Command()
    .name("heatmap-clipper")
    .description("Cut vertical clips from the most replayed moments of a YouTube video")
    .argument("[url]", "YouTube link or video id")
    .option("-c, --crop <mode>", "crop mode: center | split-left | split-right (or 1-3)")
    .option("--subtitles", "burn auto-generated subtitles")
    .option("--no-subtitles", "skip subtitles")
    .option("-o, --output-dir <dir>", "output directory")
    .option("-n, --max-clips <number>", "maximum number of clips")
    .option("-t, --min-score <value>", "heatmap threshold (0-1)")
    .option("-d, --max-duration <seconds>", "maximum clip length before padding")
    .option("-p, --padding <seconds>", "seconds added before and after each clip")
    .option("-m, --whisper-model <model>", "tiny | base | small | medium | large")
    .option("-y, --yes", "accept the transcript fallback without asking")
    .option("-v, --verbose", "print debug output");

  program.parse(argv);
  const options = program.opts<CliOptions>();
  const urlArg = program.args[0];

  const rl = createInterface({ input: stdin, output: stdout });
  const ask: Prompt = (question) => rl.question(question);

  try {
    const overrides = collectOverrides(options);
    if (options.crop !== undefined) {
      const mode = parseCropChoice(options.crop);
      if (!mode) {
        console.error(chalk.red(`Unknown crop mode "${options.crop}".`));
        return 1;
      }
      overrides.CROP_MODE = mode;
    } else if (process.env.CROP_MODE === undefined) {
      overrides.CROP_MODE = await askCropMode(ask);
    }

    // validate once without the subtitle choice so the prompt can show the model
    const preliminary = loadConfig(process.env, overrides);
    console.log(`Selected: ${describeCropMode(preliminary.cropMode)}`);

    if (options.subtitles !== undefined) {
      overrides.USE_SUBTITLE = options.subtitles;
    } else if (process.env.USE_SUBTITLE === undefined) {
      console.log(chalk.bold("\n=== Auto Subtitle ==="));
      console.log(`Available model: ${preliminary.whisperModel} (~${getModelSize(preliminary.whisperModel)})`);
      overrides.USE_SUBTITLE = parseYesNo(await ask("Add auto subtitle using Whisper? (y/n): "));
    }

    const config = loadConfig(process.env, overrides);
    console.log(
      config.subtitles
        ? chalk.green(`Subtitle enabled (model: ${config.whisperModel})`)
        : chalk.dim("Subtitle disabled"),
    );

    const link = urlArg ?? (await ask("\nLink YT: "));
    const videoId = extractVideoId(link);
    if (!videoId) {
      console.error(chalk.red("Invalid YouTube link."));
      return 1;
    }

    const logger = createLogger({ verbose: options.verbose });
    const deps = await buildRunnerDeps(config, logger);

    const heatmapSource = deps.heatmapSource;
    deps.heatmapSource = async (id) => {
      const spinner = ora({ text: "Reading YouTube heatmap data...", discardStdin: false }).start();
      try {
        const curve = await heatmapSource(id);
        spinner.succeed("Heatmap data loaded.");
        return curve;
      } catch (err) {
        spinner.fail(getErrorMessage(err));
        throw err;
      }
    };
    deps.confirmFallback = options.yes
      ? undefined
      : async () => parseYesNo(await ask("Proceed with transcript analysis? (y/n): "));
    deps.logger = logger;

    console.log(`Using crop mode: ${describeCropMode(config.cropMode)}`);
    const summary = await runClipper(config, videoId, deps);

    if (summary.plans.length === 0) {
      return 1;
    }
    printSummary(summary, config);
    return summary.rendered === 0 ? 2 : 0;
  } catch (err) {
    if (isClipperError(err)) {
      console.error(chalk.red(`${err.kind}: ${err.message}`));
      return 1;
    }
    throw err;
  } finally {
    rl.close();
  }
}

if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(chalk.red("Fatal error"), err);
      process.exitCode = 1;
    });
}
