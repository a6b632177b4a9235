import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

const mocks = vi.hoisted(() => ({
  parse: vi.fn(),
  metadata: vi.fn(),
}));

vi.mock("exifr", () => ({ parse: mocks.parse }));
vi.mock("sharp", () => ({ default: () => ({ metadata: mocks.metadata }) }));

import { createPhotoDecoder } from "../src/evidence/photo-decoder.js";
import { ReportError } from "../src/errors.js";

describe("createPhotoDecoder", () => {
  let dir: string;
  let photo: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "collection-report-photo-"));
    photo = join(dir, "front.heic");
    writeFileSync(photo, Buffer.from("not really an image"));
    mocks.parse.mockReset();
    mocks.metadata.mockReset();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("keeps only the IFD blocks of the primary decode", async () => {
    mocks.parse.mockResolvedValueOnce({
      ifd0: { "271": "Acme" },
      ifd1: { "259": 6 },
      gps: { "1": "N" },
    });

    const raw = await createPhotoDecoder().decode(photo);
    expect(raw).toEqual({ ifd0: { "271": "Acme" }, gps: { "1": "N" } });
    expect(mocks.metadata).not.toHaveBeenCalled();
  });

  it("falls back to the container's Exif block when the primary decode throws", async () => {
    const tiff = Buffer.from([0x49, 0x49, 0x2a, 0x00]);
    mocks.parse
      .mockRejectedValueOnce(new Error("Unknown file format"))
      .mockResolvedValueOnce({ exif: { "36867": "2026:03:01 09:30:00" } });
    mocks.metadata.mockResolvedValueOnce({
      exif: Buffer.concat([Buffer.from("Exif\0\0", "latin1"), tiff]),
    });

    const raw = await createPhotoDecoder().decode(photo);
    expect(raw).toEqual({ exif: { "36867": "2026:03:01 09:30:00" } });
    expect(mocks.parse).toHaveBeenCalledTimes(2);
    expect(mocks.parse.mock.calls[1]?.[0]).toEqual(tiff);
  });

  it("returns empty metadata when the container has no Exif block", async () => {
    mocks.parse.mockRejectedValueOnce(new Error("Unknown file format"));
    mocks.metadata.mockResolvedValueOnce({});

    expect(await createPhotoDecoder().decode(photo)).toEqual({});
  });

  it("raises PHOTO_DECODE_FAILED when both paths fail", async () => {
    mocks.parse.mockRejectedValueOnce(new Error("Unknown file format"));
    mocks.metadata.mockRejectedValueOnce(new Error("unsupported image format"));

    try {
      await createPhotoDecoder().decode(photo);
      expect.unreachable("should have thrown");
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(ReportError);
      if (e instanceof ReportError) {
        expect(e.code).toBe("PHOTO_DECODE_FAILED");
        expect(e.message).toBe(
          `Cannot decode photo metadata of ${photo}: Unknown file format; unsupported image format`,
        );
      }
    }
  });
});
