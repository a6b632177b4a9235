/**
 * Country and language code lookup.
 *
 * Countries resolve from ISO 3166 alpha-3, then alpha-2, then English name.
 * Languages resolve from ISO 639-3 codes. Unresolvable input yields null;
 * callers leave the original value in place.
 */

import { createRequire } from "node:module";
import countries from "i18n-iso-countries";
import { iso6393 } from "iso-639-3";
import { z } from "zod";
import type { CountryFormat } from "../config/run-config.js";

const require = createRequire(import.meta.url);

const LocaleDataSchema = z.object({
  locale: z.string(),
  countries: z.record(z.string(), z.union([z.string(), z.array(z.string())])),
});

countries.registerLocale(
  LocaleDataSchema.parse(require("i18n-iso-countries/langs/en.json")),
);

export interface CountryCodes {
  alpha2: string;
  alpha3: string;
  name: string;
}

function fromAlpha2(alpha2: string): CountryCodes | null {
  const alpha3 = countries.alpha2ToAlpha3(alpha2);
  const name = countries.getName(alpha2, "en");
  if (!alpha3 || !name) return null;
  return { alpha2, alpha3, name };
}

export function lookupCountry(value: string): CountryCodes | null {
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const upper = trimmed.toUpperCase();

  if (/^[A-Z]{3}$/.test(upper)) {
    const alpha2 = countries.alpha3ToAlpha2(upper);
    if (alpha2) return fromAlpha2(alpha2);
  }
  if (/^[A-Z]{2}$/.test(upper) && countries.isValid(upper)) {
    return fromAlpha2(upper);
  }
  const byName = countries.getAlpha2Code(trimmed, "en");
  return byName ? fromAlpha2(byName) : null;
}

export function formatCountry(
  value: string,
  format: CountryFormat,
): string | null {
  const codes = lookupCountry(value);
  if (!codes) return null;
  switch (format) {
    case "alpha_2":
      return codes.alpha2;
    case "alpha_3":
      return codes.alpha3;
    case "full_name":
      return codes.name;
  }
}

let languagesByCode: Map<string, string> | undefined;

/** English name of an ISO 639-3 language code. */
export function languageName(code: string): string | null {
  if (!languagesByCode) {
    languagesByCode = new Map(iso6393.map((lang) => [lang.iso6393, lang.name]));
  }
  return languagesByCode.get(code.trim().toLowerCase()) ?? null;
}
