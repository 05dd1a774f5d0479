import test from "node:test";
import assert from "node:assert/strict";
import { describeCropMode, loadConfig } from "../src/lib/config";
import { ConfigError } from "../src/lib/errors";

test("defaults apply when nothing is set", () => {
  const config = loadConfig({});

  assert.equal(config.outputDir, "clips");
  assert.equal(config.maxDurationSeconds, 60);
  assert.equal(config.minScore, 0.4);
  assert.equal(config.maxClips, 10);
  assert.equal(config.paddingSeconds, 10);
  assert.equal(config.topHeight, 960);
  assert.equal(config.bottomHeight, 320);
  assert.equal(config.cropMode, "center");
  assert.equal(config.subtitles, false);
  assert.equal(config.subtitleFallback, true);
  assert.equal(config.whisperModel, "tiny");
  assert.equal(config.transcribeProvider, "local");
  assert.equal(config.aiFallback, true);
  assert.equal(config.aiMinScore, 0.5);
  assert.equal(config.fetchRetries, 2);
  assert.equal(config.downloadRetries, 1);
  assert.equal(config.toolTimeoutMs, 1800000);
  assert.equal(config.pythonBin, "python3");
  assert.equal(config.openaiApiKey, undefined);
  assert.equal(config.ffmpegPath, undefined);
});

test("environment strings are coerced", () => {
  const config = loadConfig({
    MAX_CLIPS: "3",
    MIN_SCORE: "0.55",
    USE_SUBTITLE: "yes",
    AI_FALLBACK: "false",
    CROP_MODE: "split-right",
    FFMPEG_PATH: " /opt/ffmpeg/bin/ffmpeg ",
  });

  assert.equal(config.maxClips, 3);
  assert.equal(config.minScore, 0.55);
  assert.equal(config.subtitles, true);
  assert.equal(config.aiFallback, false);
  assert.equal(config.cropMode, "split-right");
  assert.equal(config.ffmpegPath, "/opt/ffmpeg/bin/ffmpeg");
});

test("overrides win over the environment", () => {
  const config = loadConfig({ MAX_CLIPS: "3", USE_SUBTITLE: "no" }, { MAX_CLIPS: 5, USE_SUBTITLE: true });

  assert.equal(config.maxClips, 5);
  assert.equal(config.subtitles, true);
});

test("empty environment values are ignored", () => {
  assert.equal(loadConfig({ OUTPUT_DIR: "" }).outputDir, "clips");
});

test("split heights must add up to the output height", () => {
  assert.throws(
    () => loadConfig({ TOP_HEIGHT: "900" }),
    (err: unknown) =>
      err instanceof ConfigError &&
      err.message === "Invalid configuration: TOP_HEIGHT: TOP_HEIGHT + BOTTOM_HEIGHT must equal 1280",
  );
  const config = loadConfig({ TOP_HEIGHT: "1000", BOTTOM_HEIGHT: "280" });
  assert.equal(config.topHeight, 1000);
});

test("out of range and unknown values are rejected", () => {
  assert.throws(() => loadConfig({ MIN_SCORE: "1.5" }), ConfigError);
  assert.throws(() => loadConfig({ MAX_CLIPS: "0" }), ConfigError);
  assert.throws(() => loadConfig({ WHISPER_MODEL: "huge" }), ConfigError);
  assert.throws(() => loadConfig({ USE_SUBTITLE: "maybe" }), ConfigError);
  assert.throws(() => loadConfig({ CROP_MODE: "left" }), ConfigError);
});

test("the hosted transcriber needs an API key", () => {
  assert.throws(() => loadConfig({ TRANSCRIBE_PROVIDER: "openai" }), ConfigError);
  const config = loadConfig({ TRANSCRIBE_PROVIDER: "openai", OPENAI_API_KEY: "test-secret" });
  assert.equal(config.openaiApiKey, "test-secret");
});

test("the config is frozen", () => {
  assert.ok(Object.isFrozen(loadConfig({})));
});

test("describeCropMode labels every mode", () => {
  assert.equal(describeCropMode("center"), "Default center crop");
  assert.equal(describeCropMode("split-left"), "Split crop (bottom-left facecam)");
  assert.equal(describeCropMode("split-right"), "Split crop (bottom-right facecam)");
});
