/**
 * Photo evidence columns: decoded metadata, checksum and coordinates for
 * each image item, under the prompt name its corpus code maps to.
 *
 * Items are processed oldest first, so when two photos map to the same
 * prompt name the newest one's values are the ones left in the row.
 */

import {
  extractExifFields,
  gpsCoordinates,
  type Coordinates,
  type ExifTagMap,
} from "../evidence/exif.js";
import type { PhotoDecoder } from "../evidence/photo-decoder.js";
import { isRecord } from "../json.js";
import type { ItemRecord } from "../records/index.js";
import { UNMAPPED_PHOTO_PROMPT, photoHeaders } from "./headers.js";
import type { ReportRow } from "./values.js";

export interface PhotoEvidenceDeps {
  photos: PhotoDecoder;
  checksum: (path: string) => Promise<string>;
  exifTags: ExifTagMap;
  photoPrompts: Readonly<Record<string, string>>;
}

export function photoPromptName(
  corpusCode: string,
  photoPrompts: Readonly<Record<string, string>>,
): string {
  return Object.hasOwn(photoPrompts, corpusCode)
    ? (photoPrompts[corpusCode] ?? UNMAPPED_PHOTO_PROMPT)
    : UNMAPPED_PHOTO_PROMPT;
}

function coordinate(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** `attributes.deviceinfo.location` as reported by the app at capture time. */
export function deviceCoordinates(item: ItemRecord): Coordinates | null {
  const deviceInfo = item.attributes["deviceinfo"];
  if (!isRecord(deviceInfo)) return null;
  const location = deviceInfo["location"];
  if (!isRecord(location)) return null;
  const lat = coordinate(location["latitude"]);
  const lng = coordinate(location["longitude"]);
  return lat === null || lng === null ? null : { lat, lng };
}

export async function applyPhotoEvidence(
  row: ReportRow,
  items: readonly ItemRecord[],
  deps: PhotoEvidenceDeps,
): Promise<void> {
  const images = items
    .filter((item) => item.promptType === "image")
    .sort((a, b) => a.created.localeCompare(b.created));

  for (const item of images) {
    const raw = await deps.photos.decode(item.path);
    const fields = extractExifFields(raw, deps.exifTags);
    const coords = gpsCoordinates(raw) ?? deviceCoordinates(item);
    const checksum = await deps.checksum(item.path);

    const [exifHeader, urlHeader, latHeader, lngHeader] = photoHeaders(
      photoPromptName(item.corpusCode, deps.photoPrompts),
    );
    row[exifHeader] = JSON.stringify(fields);
    row[urlHeader] = checksum;
    row[latHeader] = coords?.lat ?? null;
    row[lngHeader] = coords?.lng ?? null;
  }
}
