/**
 * Embedded photo metadata decoding.
 *
 * Primary path: `exifr` reads the file directly (JPEG, TIFF, HEIC/HEIF).
 * Secondary path, tried only when the primary path throws: `sharp` opens the
 * container and hands back its raw Exif block, which `exifr` then reads as
 * TIFF. A file neither path can open is PHOTO_DECODE_FAILED.
 */

import { readFile } from "node:fs/promises";
import { parse as parseExif } from "exifr";
import sharp from "sharp";
import { ReportError, errorMessage } from "../errors.js";
import { isRecord } from "../json.js";
import type { ExifNamespace, RawExif } from "./exif.js";

export interface PhotoDecoder {
  decode(path: string): Promise<RawExif>;
}

const EXIFR_OPTIONS = {
  ifd0: {},
  exif: true,
  gps: true,
  interop: true,
  ifd1: false,
  xmp: false,
  icc: false,
  iptc: false,
  mergeOutput: false,
  translateKeys: false,
  translateValues: false,
  reviveValues: false,
};

const NAMESPACES: readonly ExifNamespace[] = ["ifd0", "exif", "gps", "interop"];

/** "Exif\0\0" prefix in front of the TIFF header of an Exif block. */
const EXIF_BLOCK_HEADER = Buffer.from("Exif\0\0", "latin1");

function toRawExif(parsed: unknown): RawExif {
  const raw: RawExif = {};
  if (!isRecord(parsed)) return raw;
  for (const namespace of NAMESPACES) {
    const block = parsed[namespace];
    if (isRecord(block)) raw[namespace] = block;
  }
  return raw;
}

async function decodeContainerExif(buffer: Buffer): Promise<RawExif> {
  const { exif } = await sharp(buffer).metadata();
  if (!exif) return {};
  const tiff = exif.subarray(0, EXIF_BLOCK_HEADER.length).equals(EXIF_BLOCK_HEADER)
    ? exif.subarray(EXIF_BLOCK_HEADER.length)
    : exif;
  return toRawExif(await parseExif(tiff, EXIFR_OPTIONS));
}

export function createPhotoDecoder(): PhotoDecoder {
  return {
    async decode(path: string): Promise<RawExif> {
      const buffer = await readFile(path);
      try {
        return toRawExif(await parseExif(buffer, EXIFR_OPTIONS));
      } catch (primary: unknown) {
        try {
          return await decodeContainerExif(buffer);
        } catch (secondary: unknown) {
          throw new ReportError(
            `Cannot decode photo metadata of ${path}: ${errorMessage(primary)}; ${errorMessage(secondary)}`,
            "PHOTO_DECODE_FAILED",
            { path },
            { cause: secondary },
          );
        }
      }
    },
  };
}
