import { describe, it, expect } from "vitest";
import type { SessionRecord } from "../src/records/index.js";
import type { CacheEntry } from "../src/report/cache.js";
import {
  cachedFlag,
  reconcileSession,
  remapCachedRows,
  unsubstitute,
} from "../src/report/reconcile.js";

function session(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id: 1,
    projectId: 1,
    name: "s1",
    pinId: 1,
    created: "2026-03-01T09:00:00Z",
    completed: false,
    abandoned: false,
    duration: null,
    deviceInfo: null,
    ...overrides,
  };
}

function entry(completed: boolean, abandoned: boolean, total: number): CacheEntry {
  return {
    session: {
      "Directory Name": "s1",
      "Total items": total,
      Completed: completed,
      Abandoned: abandoned,
      Tier: "gold",
    },
    stats: [{ Session: "s1", File: "1.wav", Reason: "snr must be >= 15", snr: 9 }],
  };
}

describe("reconcileSession", () => {
  it("misses when nothing is cached, without counting items", () => {
    let counted = 0;
    const decision = reconcileSession(session(), undefined, () => {
      counted += 1;
      return 0;
    });
    expect(decision).toEqual({ kind: "miss", reason: "not_cached" });
    expect(counted).toBe(0);
  });

  it("misses an open session whose item count changed", () => {
    expect(reconcileSession(session(), entry(false, false, 3), () => 4)).toEqual({
      kind: "miss",
      reason: "item_count_changed",
    });
  });

  it("hits an open session with an unchanged item count", () => {
    const cached = entry(false, false, 3);
    expect(reconcileSession(session(), cached, () => 3)).toEqual({ kind: "hit", entry: cached });
  });

  it("hits a session cached as completed or abandoned whatever the count", () => {
    const completed = entry(true, false, 3);
    const abandoned = entry(false, true, 3);
    expect(reconcileSession(session({ completed: true }), completed, () => 9).kind).toBe("hit");
    expect(reconcileSession(session({ abandoned: true }), abandoned, () => 9).kind).toBe("hit");
  });

  it("recomputes once a session finalizes after it was cached", () => {
    expect(reconcileSession(session({ completed: true }), entry(false, false, 3), () => 3)).toEqual({
      kind: "miss",
      reason: "finalized_since_cache",
    });
    expect(reconcileSession(session({ abandoned: true }), entry(false, false, 3), () => 3)).toEqual({
      kind: "miss",
      reason: "finalized_since_cache",
    });
  });

  it("reads string flags and counts written by other tools", () => {
    const cached: CacheEntry = {
      session: { "Directory Name": "s1", "Total items": "3", Completed: "TRUE", Abandoned: "FALSE" },
      stats: [],
    };
    expect(reconcileSession(session({ completed: true }), cached, () => 7).kind).toBe("hit");
  });

  it("reads flags through the substitution table they were written with", () => {
    const cached: CacheEntry = {
      session: { "Directory Name": "s1", "Total items": 3, Completed: "Yes", Abandoned: "No" },
      stats: [],
    };
    const substitutions = {
      Completed: { true: "Yes", false: "No" },
      Abandoned: { true: "Yes", false: "No" },
    };
    expect(reconcileSession(session({ completed: true }), cached, () => 5, substitutions)).toEqual({
      kind: "hit",
      entry: cached,
    });
    expect(reconcileSession(session({ completed: true }), cached, () => 3)).toEqual({
      kind: "miss",
      reason: "finalized_since_cache",
    });
  });
});

describe("unsubstitute", () => {
  it("returns the key whose replacement produced the value", () => {
    expect(unsubstitute("Yes", { true: "Yes", false: "No" })).toBe("true");
    expect(unsubstitute("No", { True: "Yes", False: "No" })).toBe("False");
    expect(unsubstitute("Maybe", { true: "Yes" })).toBe("Maybe");
    expect(unsubstitute(true, { true: "Yes" })).toBe(true);
    expect(unsubstitute("Yes", undefined)).toBe("Yes");
  });
});

describe("cachedFlag", () => {
  it("treats true and non-zero values as set", () => {
    expect(cachedFlag("True")).toBe(true);
    expect(cachedFlag("1")).toBe(true);
    expect(cachedFlag(1)).toBe(true);
    expect(cachedFlag("False")).toBe(false);
    expect(cachedFlag("0")).toBe(false);
    expect(cachedFlag("")).toBe(false);
    expect(cachedFlag("No")).toBe(false);
    expect(cachedFlag(null)).toBe(false);
  });
});

describe("remapCachedRows", () => {
  it("projects cached rows onto the current headers", () => {
    const result = remapCachedRows(entry(true, false, 3), {
      sessionHeaders: ["Directory Name", "Total items", "Completed", "Abandoned", "Email"],
      statHeaders: ["Session", "File", "Reason", "rms"],
      statValueHeaders: ["rms"],
    });
    expect(result).toEqual({
      sessionRow: {
        "Directory Name": "s1",
        "Total items": 3,
        Completed: true,
        Abandoned: false,
        Email: null,
      },
      statRows: [{ Session: "s1", File: "1.wav", Reason: "snr must be >= 15", rms: null }],
    });
  });
});
