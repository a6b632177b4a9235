import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createRunConfig } from "../src/config/run-config.js";
import { collectingDiagnostics } from "../src/diagnostics.js";
import { buildReportSchema } from "../src/report/headers.js";
import {
  collectItemStatistics,
  median,
  medianOfSamples,
  sessionDuration,
  statValue,
} from "../src/report/item-stats.js";
import { RecordFixture } from "./fixtures/records.js";

const STAT_SCHEMA = {
  type: "object",
  properties: {
    snr: { type: "number", minimum: 15 },
    video: { type: "object", properties: { width: { type: "number" } } },
    audio: { type: "object", properties: { rms: { type: "number" } } },
  },
};

describe("statValue", () => {
  const document = { snr: 12, video: { width: 640 }, audio: { rms: 0.3 } };

  it("reads recordings at the top level", () => {
    expect(statValue(document, "recording", "snr")).toBe(12);
    expect(statValue(document, "recording", "video/width")).toBeUndefined();
  });

  it("reads other types from their nested block", () => {
    expect(statValue(document, "video", "video/width")).toBe(640);
    expect(statValue(document, "video", "snr")).toBeUndefined();
    expect(statValue(document, "image", "video/width")).toBeUndefined();
  });

  it("lets video items answer audio fields", () => {
    expect(statValue(document, "video", "audio/rms")).toBe(0.3);
    expect(statValue(document, "image", "audio/rms")).toBeUndefined();
  });
});

describe("median", () => {
  it("takes the middle value or the mean of the middle two", () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBe(0);
  });

  it("skips sentinels silently and reports other non-numbers", () => {
    const diagnostics = collectingDiagnostics();
    expect(medianOfSamples("snr", [10, "NaN", 20, "bogus"], diagnostics)).toBe(15);
    expect(diagnostics.warnings).toEqual(["bogus unrecognised output of stats for snr"]);
  });

  it("defaults to 0 without numeric samples", () => {
    const diagnostics = collectingDiagnostics();
    expect(medianOfSamples("snr", ["Infinity"], diagnostics)).toBe(0);
    expect(diagnostics.warnings).toEqual([]);
  });
});

describe("collectItemStatistics", () => {
  let fx: RecordFixture;
  let sessionId: number;

  beforeEach(() => {
    fx = new RecordFixture();
    const pinId = fx.addPin("PIN-1", fx.addUser("a@example.com"));
    const projectId = fx.addProject();
    sessionId = fx.addSession({ projectId, name: "s1", pinId, created: "2026-03-01T09:00:00Z" });

    const item = (path: string, promptType: string, corpusCode: string, minute: number, skipped = false) =>
      fx.addItem({
        sessionId,
        path,
        promptType,
        corpusCode,
        skipped,
        created: `2026-03-01T09:${String(minute).padStart(2, "0")}:00Z`,
      });
    item("/s/1.wav", "recording", "r1", 1);
    item("/s/2.wav", "recording", "r2", 2);
    item("/s/3.wav", "recording", "r3", 3);
    item("/s/4.wav", "recording", "r4", 4, true);
    item("/s/5.mp4", "video", "v1", 5);
    item("/s/6.wav", "recording", "excluded", 6);

    fx.addStat("/s/1.wav", "2026-03-01T10:00:00Z", { snr: 10 });
    fx.addStat("/s/2.wav", "2026-03-01T10:00:00Z", { snr: 20 });
    fx.addStat("/s/5.mp4", "2026-03-01T10:00:00Z", {
      video: { width: "wide", duration: 1500 },
      audio: { rms: 0.2 },
    });
    fx.addStat("/s/6.wav", "2026-03-01T10:00:00Z", { snr: 1 });
  });

  afterEach(() => {
    fx.cleanup();
  });

  function run(medianStats: boolean) {
    const config = createRunConfig(
      { statSchema: STAT_SCHEMA, medianStats, excludeCorpusCodes: ["excluded"] },
      collectingDiagnostics(),
    );
    const schema = buildReportSchema(config, { inputNames: [], hasUnmappedPhotoCodes: false });
    const store = fx.openStore();
    const [session] = store.listSessions(1);
    if (!session) throw new Error("fixture session missing");
    return collectItemStatistics(session, store.listItems(sessionId), store, config, schema);
  }

  it("emits one stat row per failing item and counts missing stats", () => {
    const stats = run(false);

    expect(stats.counts).toEqual({ total: 6, skipped: 1, recorded: 5 });
    expect(stats.rejected).toBe(2);
    expect(stats.missingStats).toBe(1);
    expect(stats.statRows).toEqual([
      { Session: "s1", File: "1.wav", Reason: "snr must be >= 15", snr: 10 },
      {
        Session: "s1",
        File: "5.mp4",
        Reason: "video/width must be number",
        "audio/rms": 0.2,
        "video/width": "wide",
      },
    ]);
    expect(stats.samples.size).toBe(0);
  });

  it("samples every validated item in median mode", () => {
    const stats = run(true);

    expect(stats.rejected).toBe(2);
    expect(stats.samples.get("snr")).toEqual([10, 20]);
    expect(stats.samples.get("audio/rms")).toEqual([0.2]);
    expect(stats.samples.get("video/width")).toEqual(["wide"]);
  });

  it("does nothing beyond counting without a stat schema", () => {
    const config = createRunConfig({}, collectingDiagnostics());
    const schema = buildReportSchema(config, { inputNames: [], hasUnmappedPhotoCodes: false });
    const store = fx.openStore();
    const [session] = store.listSessions(1);
    if (!session) throw new Error("fixture session missing");
    const stats = collectItemStatistics(session, store.listItems(sessionId), store, config, schema);
    expect(stats.rejected).toBe(0);
    expect(stats.missingStats).toBe(0);
    expect(stats.statRows).toEqual([]);
  });

  it("sums nested video and image durations when none was recorded", () => {
    fx.addItem({ sessionId, path: "/s/7.jpg", promptType: "image", corpusCode: "1image1", created: "2026-03-01T09:07:00Z" });
    fx.addStat("/s/7.jpg", "2026-03-01T10:00:00Z", { image: { duration: 500 } });

    const store = fx.openStore();
    const [session] = store.listSessions(1);
    if (!session) throw new Error("fixture session missing");
    const items = store.listItems(sessionId);
    expect(sessionDuration(session, items, store)).toBe(2);
    expect(sessionDuration({ ...session, duration: 42 }, items, store)).toBe(42);
  });
});
