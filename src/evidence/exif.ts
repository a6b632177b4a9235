/**
 * Photo metadata fields reported per image.
 *
 * Tags resolve through one enumerated table `tag name → (IFD, numeric key)`.
 * `buildExifTagMap` runs once at startup and throws UNKNOWN_EXIF_TAG for a
 * name the table does not know.
 *
 * Raw metadata arrives as one block per IFD with numeric tag keys, the shape
 * `exifr` produces with `translateKeys: false` and `mergeOutput: false`.
 */

import { parse as parseDate, isValid } from "date-fns";
import { ReportError } from "../errors.js";

export type ExifNamespace = "ifd0" | "exif" | "gps" | "interop";

export interface ExifTag {
  namespace: ExifNamespace;
  key: number;
}

/** Raw decoded metadata: IFD → tag number → value. */
export type RawExif = Partial<Record<ExifNamespace, Record<string, unknown>>>;

const GPS_LATITUDE_REF: ExifTag = { namespace: "gps", key: 0x0001 };
const GPS_LATITUDE: ExifTag = { namespace: "gps", key: 0x0002 };
const GPS_LONGITUDE_REF: ExifTag = { namespace: "gps", key: 0x0003 };
const GPS_LONGITUDE: ExifTag = { namespace: "gps", key: 0x0004 };

const EXIF_TAG_TABLE: Readonly<Record<string, ExifTag>> = {
  InteroperabilityIndex: { namespace: "interop", key: 0x0001 },
  InteroperabilityVersion: { namespace: "interop", key: 0x0002 },
  Compression: { namespace: "ifd0", key: 0x0103 },
  Make: { namespace: "ifd0", key: 0x010f },
  Model: { namespace: "ifd0", key: 0x0110 },
  Orientation: { namespace: "ifd0", key: 0x0112 },
  XResolution: { namespace: "ifd0", key: 0x011a },
  YResolution: { namespace: "ifd0", key: 0x011b },
  ResolutionUnit: { namespace: "ifd0", key: 0x0128 },
  Software: { namespace: "ifd0", key: 0x0131 },
  DateTime: { namespace: "ifd0", key: 0x0132 },
  YCbCrPositioning: { namespace: "ifd0", key: 0x0213 },
  GPSLatitudeRef: GPS_LATITUDE_REF,
  GPSLatitude: GPS_LATITUDE,
  GPSLongitudeRef: GPS_LONGITUDE_REF,
  GPSLongitude: GPS_LONGITUDE,
  ExposureTime: { namespace: "exif", key: 0x829a },
  FNumber: { namespace: "exif", key: 0x829d },
  ExposureProgram: { namespace: "exif", key: 0x8822 },
  ExifVersion: { namespace: "exif", key: 0x9000 },
  DateTimeOriginal: { namespace: "exif", key: 0x9003 },
  DateTimeDigitized: { namespace: "exif", key: 0x9004 },
  ComponentsConfiguration: { namespace: "exif", key: 0x9101 },
  CompressedBitsPerPixel: { namespace: "exif", key: 0x9102 },
  ExposureBiasValue: { namespace: "exif", key: 0x9204 },
  MaxApertureValue: { namespace: "exif", key: 0x9205 },
  MeteringMode: { namespace: "exif", key: 0x9207 },
  Flash: { namespace: "exif", key: 0x9209 },
  FocalLength: { namespace: "exif", key: 0x920a },
  FlashpixVersion: { namespace: "exif", key: 0xa000 },
  ColorSpace: { namespace: "exif", key: 0xa001 },
  PixelXDimension: { namespace: "exif", key: 0xa002 },
  PixelYDimension: { namespace: "exif", key: 0xa003 },
  FileSource: { namespace: "exif", key: 0xa300 },
};

/** Fields written to the `<prompt>_photo_exif` column, in this order. */
export const EXIF_HEADERS: readonly string[] = [
  "Make",
  "Model",
  "Orientation",
  "Software",
  "DateTime",
  "YCbCrPositioning",
  "Compression",
  "XResolution",
  "YResolution",
  "ResolutionUnit",
  "ExposureTime",
  "FNumber",
  "ExposureProgram",
  "ExifVersion",
  "DateTimeOriginal",
  "DateTimeDigitized",
  "ComponentsConfiguration",
  "CompressedBitsPerPixel",
  "ExposureBiasValue",
  "MaxApertureValue",
  "MeteringMode",
  "Flash",
  "FocalLength",
  "FlashpixVersion",
  "ColorSpace",
  "PixelXDimension",
  "PixelYDimension",
  "FileSource",
  "InteroperabilityIndex",
  "InteroperabilityVersion",
  "GPSLatitude",
  "GPSLongitude",
];

const DATE_TAGS: ReadonlySet<string> = new Set([
  "DateTime",
  "DateTimeOriginal",
  "DateTimeDigitized",
]);

export type ExifTagMap = ReadonlyMap<string, ExifTag>;

export function buildExifTagMap(headers: readonly string[]): ExifTagMap {
  const map = new Map<string, ExifTag>();
  for (const header of headers) {
    const tag = EXIF_TAG_TABLE[header];
    if (!tag) {
      throw new ReportError(
        `${header} is not a valid Exif tag`,
        "UNKNOWN_EXIF_TAG",
        { tag: header },
      );
    }
    map.set(header, tag);
  }
  return map;
}

function rawTag(raw: RawExif, tag: ExifTag): unknown {
  return raw[tag.namespace]?.[String(tag.key)];
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Byte strings become text when they decode; other values pass through. */
function decodeBytes(value: unknown): unknown {
  if (!(value instanceof Uint8Array)) return value;
  try {
    return utf8.decode(value).replace(/\0+$/, "");
  } catch {
    return Array.from(value);
  }
}

/** EXIF "YYYY:MM:DD HH:mm:ss" (local time) → epoch microseconds. */
function exifDateToMicros(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const parsed = parseDate(value.trim(), "yyyy:MM:dd HH:mm:ss", new Date());
  return isValid(parsed) ? parsed.getTime() * 1000 : value;
}

/**
 * Extract the requested fields. Missing tags are `null`; the result
 * serializes directly to the exif column.
 */
export function extractExifFields(
  raw: RawExif,
  tags: ExifTagMap,
): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [header, tag] of tags) {
    let value = decodeBytes(rawTag(raw, tag));
    if (DATE_TAGS.has(header)) value = exifDateToMicros(value);
    fields[header] = value ?? null;
  }
  return fields;
}

// ---------------------------------------------------------------------------
// GPS
// ---------------------------------------------------------------------------

/** `[numerator, denominator]` or an already-divided number. */
function rationalValue(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "number" &&
    typeof value[1] === "number" &&
    value[1] !== 0
  ) {
    return value[0] / value[1];
  }
  return null;
}

/**
 * Degrees/minutes/seconds → decimal degrees.
 * `[[33, 1], [47, 1], [37131958, 1000000]]` → 33.79364776…
 */
export function dmsToDecimal(value: unknown): number | null {
  if (!Array.isArray(value) || value.length !== 3) return null;
  const [degrees, minutes, seconds] = value.map(rationalValue);
  if (degrees == null || minutes == null || seconds == null) return null;
  return degrees + minutes / 60 + seconds / 3600;
}

function signed(value: number | null, ref: unknown, negative: string): number | null {
  if (value === null) return null;
  const text = decodeBytes(ref);
  return typeof text === "string" && text.trim().toUpperCase() === negative
    ? -value
    : value;
}

export interface Coordinates {
  lat: number;
  lng: number;
}

/**
 * Latitude/longitude from the GPS block, signed by the hemisphere refs.
 * Null when either is absent or zero.
 */
export function gpsCoordinates(raw: RawExif): Coordinates | null {
  const lat = signed(
    dmsToDecimal(rawTag(raw, GPS_LATITUDE)),
    rawTag(raw, GPS_LATITUDE_REF),
    "S",
  );
  const lng = signed(
    dmsToDecimal(rawTag(raw, GPS_LONGITUDE)),
    rawTag(raw, GPS_LONGITUDE_REF),
    "W",
  );
  if (!lat || !lng) return null;
  return { lat, lng };
}
