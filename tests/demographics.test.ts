import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { compileDemographics } from "../src/config/run-config.js";
import { applyDemographics, parseAge } from "../src/report/demographics.js";
import type { ReportRow } from "../src/report/values.js";
import { RecordFixture } from "./fixtures/records.js";

const TODAY = new Date(2026, 9, 19);

describe("parseAge", () => {
  it("reads ISO dates and Date values", () => {
    expect(parseAge("1990-05-01", TODAY)).toBe(36);
    expect(parseAge(new Date(1990, 0, 1), TODAY)).toBe(36);
  });

  it("prefers month-first over day-first for ambiguous slashes", () => {
    expect(parseAge("03/04/1990", TODAY)).toBe(36);
    expect(parseAge("25/12/1990", TODAY)).toBe(35);
  });

  it("reads written month names", () => {
    expect(parseAge("1 June 2000", TODAY)).toBe(26);
    expect(parseAge("Oct 20, 2000", TODAY)).toBe(25);
  });

  it("reports values it cannot read", () => {
    expect(parseAge("yesterday", TODAY)).toBe("Unknown data format: yesterday");
    expect(parseAge(42, TODAY)).toBe("Unknown data format: 42");
  });
});

describe("applyDemographics", () => {
  let fx: RecordFixture;

  beforeEach(() => {
    fx = new RecordFixture();
    fx.addDemographicUser({
      id: 42,
      email: "someone@example.com",
      country: "Kenya",
      state: "Nairobi County",
      city: "Nairobi",
    });
    fx.addUserAttribute(42, 7, "1990-05-01");
    fx.addUserAttribute(42, 8, "1 June 2000");
    fx.addUserAttribute(42, 9, "eng");
  });

  afterEach(() => {
    fx.cleanup();
  });

  function baseRow(pin: string): ReportRow {
    return { "Directory Name": "s1", Pin: pin, Email: "app@example.com", Country: null };
  }

  it("overwrites identity columns and reads attributes", () => {
    const rules = compileDemographics({
      pattern: "\\d+",
      attributes: { "Age (ia)": 7, age_bracket: 8, First_Language: 9 },
    });
    const row = baseRow("PIN-0042");

    applyDemographics(row, rules, fx.openStore(), TODAY);

    expect(row).toEqual({
      "Directory Name": "s1",
      Pin: "PIN-0042",
      "Connect User ID": 42,
      Email: "someone@example.com",
      Country: "Kenya",
      State: "Nairobi County",
      City: "Nairobi",
      "Age (ia)": 36,
      age_bracket: "26",
      First_Language: "eng",
    });
  });

  it("parses Age when no Age (ia) attribute is configured", () => {
    const rules = compileDemographics({ pattern: "\\d+", attributes: { Age: 7 } });
    const row = baseRow("PIN-0042");

    applyDemographics(row, rules, fx.openStore(), TODAY);

    expect(row["Age"]).toBe(36);
  });

  it("leaves Age raw when Age (ia) is configured but blank", () => {
    const rules = compileDemographics({
      pattern: "\\d+",
      attributes: { Age: 7, "Age (ia)": 99 },
    });
    const row = baseRow("PIN-0042");

    applyDemographics(row, rules, fx.openStore(), TODAY);

    expect(row["Age"]).toBe("1990-05-01");
    expect(row["Age (ia)"]).toBeNull();
  });

  it("changes nothing when the pin has no id or the user is unknown", () => {
    const rules = compileDemographics({ pattern: "\\d+", attributes: { Age: 7 } });
    const noDigits = baseRow("PIN-ABC");
    const unknown = baseRow("PIN-0099");

    applyDemographics(noDigits, rules, fx.openStore(), TODAY);
    applyDemographics(unknown, rules, fx.openStore(), TODAY);

    expect(noDigits).toEqual(baseRow("PIN-ABC"));
    expect(unknown).toEqual(baseRow("PIN-0099"));
  });
});
