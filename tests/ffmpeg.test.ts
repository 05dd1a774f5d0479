import test from "node:test";
import assert from "node:assert/strict";
import { buildCropFilter, buildRenderArgs } from "../src/services/ffmpeg";

const SCALE = "scale='if(gt(iw/ih,720/1280),-2,720)':'if(gt(iw/ih,720/1280),1280,-2)'";
const HEIGHTS = { topHeight: 960, bottomHeight: 320 };

test("center mode scales to cover and crops the middle", () => {
  assert.deepEqual(buildCropFilter("center", HEIGHTS), {
    kind: "simple",
    graph: `${SCALE},crop=720:1280:(iw-720)/2:(ih-1280)/2,setsar=1`,
  });
});

test("split-left stacks the centre over the bottom-left corner", () => {
  assert.deepEqual(buildCropFilter("split-left", HEIGHTS), {
    kind: "complex",
    outputLabel: "[out]",
    graph: [
      `[0:v]${SCALE}[scaled]`,
      "[scaled]split=2[s1][s2]",
      "[s1]crop=720:960:(iw-720)/2:(ih-1280)/2[top]",
      "[s2]crop=720:320:0:ih-320[bottom]",
      "[top][bottom]vstack=inputs=2,setsar=1[out]",
    ].join(";"),
  });
});

test("split-right takes the facecam from the bottom-right corner", () => {
  const filter = buildCropFilter("split-right", { topHeight: 1000, bottomHeight: 280 });
  assert.equal(filter.kind, "complex");
  const parts = filter.graph.split(";");
  assert.equal(parts[2], "[s1]crop=720:1000:(iw-720)/2:(ih-1280)/2[top]");
  assert.equal(parts[3], "[s2]crop=720:280:iw-720:ih-280[bottom]");
});

test("render args for a simple filter", () => {
  const filter = buildCropFilter("center", HEIGHTS);
  assert.deepEqual(buildRenderArgs("in.mp4", "out.mp4", filter), [
    "-y",
    "-hide_banner",
    "-loglevel",
    "error",
    "-i",
    "in.mp4",
    "-vf",
    filter.graph,
    "-map",
    "0:v:0",
    "-map",
    "0:a?",
    "-c:v",
    "libx264",
    "-preset",
    "ultrafast",
    "-crf",
    "26",
    "-pix_fmt",
    "yuv420p",
    "-c:a",
    "aac",
    "-b:a",
    "128k",
    "-movflags",
    "+faststart",
    "out.mp4",
  ]);
});

test("render args for a split filter map the stacked output", () => {
  const filter = buildCropFilter("split-left", HEIGHTS);
  const args = buildRenderArgs("in.mp4", "out.mp4", filter);
  assert.deepEqual(args.slice(6, 12), ["-filter_complex", filter.graph, "-map", "[out]", "-map", "0:a?"]);
  assert.equal(args[args.length - 1], "out.mp4");
});
