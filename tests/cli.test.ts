import test from "node:test";
import assert from "node:assert/strict";
import { parseCropChoice, parseYesNo } from "../src/cli";

test("crop choices accept menu numbers and mode names", () => {
  assert.equal(parseCropChoice("1"), "center");
  assert.equal(parseCropChoice("2"), "split-left");
  assert.equal(parseCropChoice(" 3 "), "split-right");
  assert.equal(parseCropChoice("Split-Left"), "split-left");
  assert.equal(parseCropChoice("4"), null);
  assert.equal(parseCropChoice(""), null);
});

test("yes/no answers default to no", () => {
  assert.equal(parseYesNo("y"), true);
  assert.equal(parseYesNo(" YES "), true);
  assert.equal(parseYesNo("n"), false);
  assert.equal(parseYesNo("sure"), false);
  assert.equal(parseYesNo(""), false);
});
