import test from "node:test";
import assert from "node:assert/strict";
import { FetchFailure, NoHeatmapData } from "../src/lib/errors";
import { curveEndSeconds, fetchHeatmap, parseHeatmapMarkers } from "../src/services/heatmap";

const VIDEO_ID = "abcDEF12345";

function watchPage(markers: unknown[]): string {
  return (
    `<html><script>var ytInitialData = {"frameworkUpdates":{"mutations":[{"payload":{"macroMarkersListEntity":` +
    `{"markersList":{"markerType":"MARKER_TYPE_HEATMAP","markers":${JSON.stringify(markers)},` +
    `"markersMetadata":{}}}}}]}};</script></html>`
  );
}

const noSleep = async (): Promise<void> => {};

class BrokenBodyResponse extends Response {
  async text(): Promise<string> {
    throw new TypeError("terminated");
  }
}

test("parses wrapped markers into a sorted curve", () => {
  const html = watchPage([
    { heatMarkerRenderer: { startMillis: "4000", durationMillis: "2000", intensityScoreNormalized: 0.5 } },
    { heatMarkerRenderer: { startMillis: "0", durationMillis: "2000", intensityScoreNormalized: 1 } },
    { heatMarkerRenderer: { startMillis: "2000", durationMillis: "2000", intensityScoreNormalized: 0.25 } },
  ]);

  assert.deepEqual(parseHeatmapMarkers(html, VIDEO_ID), {
    videoId: VIDEO_ID,
    bucketSeconds: 2,
    samples: [
      { offsetSeconds: 0, durationSeconds: 2, score: 1 },
      { offsetSeconds: 2, durationSeconds: 2, score: 0.25 },
      { offsetSeconds: 4, durationSeconds: 2, score: 0.5 },
    ],
  });
});

test("parses plain markers with numeric fields", () => {
  const html = watchPage([
    { startMillis: 0, durationMillis: 1500, intensityScoreNormalized: 0.1 },
    { startMillis: 1500, durationMillis: 1500, intensityScoreNormalized: 0.9 },
  ]);

  const curve = parseHeatmapMarkers(html, VIDEO_ID);
  assert.equal(curve.bucketSeconds, 1.5);
  assert.deepEqual(
    curve.samples.map((s) => s.score),
    [0.1, 0.9],
  );
});

test("unescapes markers embedded in a JSON string", () => {
  const escaped = JSON.stringify([{ startMillis: "0", durationMillis: "1000", intensityScoreNormalized: 0.3 }]).replace(
    /"/g,
    '\\"',
  );
  const html = `window.data = "{"markers": ${escaped}, "markersMetadata": 1}"`;

  assert.deepEqual(parseHeatmapMarkers(html, VIDEO_ID).samples, [
    { offsetSeconds: 0, durationSeconds: 1, score: 0.3 },
  ]);
});

test("skips malformed markers and clamps scores", () => {
  const html = watchPage([
    { foo: 1 },
    { startMillis: "x", durationMillis: "1000", intensityScoreNormalized: 0.4 },
    { startMillis: "1000", durationMillis: "0", intensityScoreNormalized: 0.4 },
    { startMillis: "2000", durationMillis: "1000", intensityScoreNormalized: 1.4 },
    { startMillis: "3000", durationMillis: "1000" },
  ]);

  assert.deepEqual(parseHeatmapMarkers(html, VIDEO_ID).samples, [
    { offsetSeconds: 2, durationSeconds: 1, score: 1 },
    { offsetSeconds: 3, durationSeconds: 1, score: 0 },
  ]);
});

test("a page without markers has no heatmap", () => {
  assert.throws(() => parseHeatmapMarkers("<html></html>", VIDEO_ID), NoHeatmapData);
});

test("a marker list with nothing usable has no heatmap", () => {
  assert.throws(() => parseHeatmapMarkers(watchPage([{ foo: 1 }]), VIDEO_ID), NoHeatmapData);
});

test("an unparseable marker payload is a fetch failure", () => {
  const html = `"markers": [{not json}], "markersMetadata"`;
  assert.throws(() => parseHeatmapMarkers(html, VIDEO_ID), FetchFailure);
});

test("curveEndSeconds covers the last bucket", () => {
  assert.equal(
    curveEndSeconds({
      videoId: VIDEO_ID,
      bucketSeconds: 2,
      samples: [
        { offsetSeconds: 0, durationSeconds: 2, score: 0 },
        { offsetSeconds: 2, durationSeconds: 2, score: 1 },
      ],
    }),
    4,
  );
  assert.equal(curveEndSeconds({ videoId: VIDEO_ID, bucketSeconds: 0, samples: [] }), 0);
});

test("fetchHeatmap requests the watch page for the video", async () => {
  const urls: string[] = [];
  const curve = await fetchHeatmap(VIDEO_ID, {
    sleep: noSleep,
    fetchImpl: async (url) => {
      urls.push(url);
      return new Response(watchPage([{ startMillis: "0", durationMillis: "1000", intensityScoreNormalized: 0.5 }]));
    },
  });

  assert.deepEqual(urls, [`https://www.youtube.com/watch?v=${VIDEO_ID}`]);
  assert.equal(curve.samples.length, 1);
});

test("fetchHeatmap retries server errors", async () => {
  let calls = 0;
  const curve = await fetchHeatmap(VIDEO_ID, {
    sleep: noSleep,
    fetchImpl: async () => {
      calls++;
      if (calls === 1) {
        return new Response("unavailable", { status: 503 });
      }
      return new Response(watchPage([{ startMillis: "0", durationMillis: "1000", intensityScoreNormalized: 0.5 }]));
    },
  });

  assert.equal(calls, 2);
  assert.equal(curve.samples[0]?.score, 0.5);
});

test("fetchHeatmap does not retry a 404", async () => {
  let calls = 0;
  await assert.rejects(
    fetchHeatmap(VIDEO_ID, {
      sleep: noSleep,
      fetchImpl: async () => {
        calls++;
        return new Response("missing", { status: 404 });
      },
    }),
    (err: unknown) => err instanceof FetchFailure && err.status === 404,
  );
  assert.equal(calls, 1);
});

test("fetchHeatmap gives up after the configured retries on network errors", async () => {
  let calls = 0;
  await assert.rejects(
    fetchHeatmap(VIDEO_ID, {
      retries: 2,
      sleep: noSleep,
      fetchImpl: async () => {
        calls++;
        throw new TypeError("fetch failed");
      },
    }),
    (err: unknown) => err instanceof FetchFailure && err.status === undefined,
  );
  assert.equal(calls, 3);
});

test("a body that fails mid-read is a retried fetch failure", async () => {
  let calls = 0;
  await assert.rejects(
    fetchHeatmap(VIDEO_ID, {
      retries: 2,
      sleep: noSleep,
      fetchImpl: async () => {
        calls++;
        return new BrokenBodyResponse("partial");
      },
    }),
    (err: unknown) =>
      err instanceof FetchFailure &&
      err.message === "Could not read watch page body: terminated" &&
      err.cause instanceof TypeError,
  );
  assert.equal(calls, 3);
});

test("fetchHeatmap surfaces missing markers without retrying", async () => {
  let calls = 0;
  await assert.rejects(
    fetchHeatmap(VIDEO_ID, {
      sleep: noSleep,
      fetchImpl: async () => {
        calls++;
        return new Response("<html></html>");
      },
    }),
    NoHeatmapData,
  );
  assert.equal(calls, 1);
});
