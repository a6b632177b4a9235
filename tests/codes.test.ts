import { describe, it, expect } from "vitest";
import { formatCountry, languageName, lookupCountry } from "../src/evidence/codes.js";

describe("lookupCountry", () => {
  it("resolves alpha-3, alpha-2 and English names", () => {
    const kenya = { alpha2: "KE", alpha3: "KEN", name: "Kenya" };
    expect(lookupCountry("KEN")).toEqual(kenya);
    expect(lookupCountry("ke")).toEqual(kenya);
    expect(lookupCountry("Kenya")).toEqual(kenya);
  });

  it("returns null for unknown values", () => {
    expect(lookupCountry("Atlantis")).toBeNull();
    expect(lookupCountry("")).toBeNull();
  });
});

describe("formatCountry", () => {
  it("formats to the requested representation", () => {
    expect(formatCountry("Kenya", "alpha_2")).toBe("KE");
    expect(formatCountry("KE", "alpha_3")).toBe("KEN");
    expect(formatCountry("KEN", "full_name")).toBe("Kenya");
    expect(formatCountry("Atlantis", "alpha_2")).toBeNull();
  });
});

describe("languageName", () => {
  it("maps ISO 639-3 codes to names", () => {
    expect(languageName("eng")).toBe("English");
    expect(languageName("FRA")).toBe("French");
    expect(languageName("zzzz")).toBeNull();
  });
});
