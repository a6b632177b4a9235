import { describe, it, expect } from "vitest";
import { createRunConfig } from "../src/config/run-config.js";
import { collectingDiagnostics } from "../src/diagnostics.js";
import {
  BASE_SESSION_HEADERS,
  buildReportSchema,
  statValueHeadersFor,
} from "../src/report/headers.js";

const PHOTO_HEADERS = [
  "ev_station_photo_exif",
  "ev_station_photo_url",
  "ev_station_photo_lat",
  "ev_station_photo_lng",
  "user_interface_photo_exif",
  "user_interface_photo_url",
  "user_interface_photo_lat",
  "user_interface_photo_lng",
  "plug_photo_exif",
  "plug_photo_url",
  "plug_photo_lat",
  "plug_photo_lng",
];

const STAT_SCHEMA = {
  type: "object",
  properties: {
    video: { properties: { width: {}, height: {} } },
    snr: { type: "number" },
    audio: { properties: { rms: {} } },
  },
};

describe("statValueHeadersFor", () => {
  it("sorts properties and expands media types", () => {
    expect(statValueHeadersFor(STAT_SCHEMA.properties)).toEqual([
      "audio/rms",
      "snr",
      "video/width",
      "video/height",
    ]);
  });
});

describe("buildReportSchema", () => {
  it("starts with the base headers and the default photo columns", () => {
    const schema = buildReportSchema(createRunConfig({}, collectingDiagnostics()), {
      inputNames: [],
      hasUnmappedPhotoCodes: false,
    });
    expect(schema.sessionHeaders).toEqual([...BASE_SESSION_HEADERS, ...PHOTO_HEADERS]);
    expect(schema.statHeaders).toEqual(["Session", "File", "Reason"]);
    expect(Object.isFrozen(schema.sessionHeaders)).toBe(true);
  });

  it("appends every optional group in order without repeating a header", () => {
    const config = createRunConfig(
      {
        statSchema: STAT_SCHEMA,
        medianStats: true,
        demographics: { pattern: "\\d+", attributes: { Gender: 2, Age: 1 } },
        scriptCategories: [{ title: "Tier", rules: [["1", "a"]] }],
        bluetooth: true,
        inputs: true,
        photoPrompts: { p1: "front" },
        promptAttributes: ["Prompt", "Pin"],
      },
      collectingDiagnostics(),
    );
    const schema = buildReportSchema(config, {
      inputNames: ["Network", "Floor", "Network"],
      hasUnmappedPhotoCodes: true,
    });

    expect(schema.sessionHeaders).toEqual([
      ...BASE_SESSION_HEADERS,
      "audio/rms",
      "snr",
      "video/width",
      "video/height",
      "missing_stats",
      "Connect User ID",
      "State",
      "City",
      "Age",
      "Gender",
      "Tier",
      "Bluetooth Name",
      "Bluetooth Type",
      "Floor",
      "Network",
      "front_photo_exif",
      "front_photo_url",
      "front_photo_lat",
      "front_photo_lng",
      "missing_prompt_photo_exif",
      "missing_prompt_photo_url",
      "missing_prompt_photo_lat",
      "missing_prompt_photo_lng",
      "Prompt",
    ]);
    expect(schema.statHeaders).toEqual([
      "Session",
      "File",
      "Reason",
      "audio/rms",
      "snr",
      "video/width",
      "video/height",
    ]);
  });

  it("keeps stat value headers out of the session table without median mode", () => {
    const config = createRunConfig({ statSchema: STAT_SCHEMA }, collectingDiagnostics());
    const schema = buildReportSchema(config, { inputNames: [], hasUnmappedPhotoCodes: false });
    expect(schema.sessionHeaders).not.toContain("snr");
    expect(schema.statValueHeaders).toEqual(["audio/rms", "snr", "video/width", "video/height"]);
  });
});
