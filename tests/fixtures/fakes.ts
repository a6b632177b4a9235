import type { GeoMeta, GeolocationClient } from "../../src/evidence/geolocation.js";
import type { RawExif } from "../../src/evidence/exif.js";
import type { PhotoDecoder } from "../../src/evidence/photo-decoder.js";
import type { UploadResult, Uploader } from "../../src/upload/rclone.js";

export function fakeGeolocation(
  table: Record<string, GeoMeta>,
): GeolocationClient & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async lookup(ip: string): Promise<GeoMeta | null> {
      calls.push(ip);
      return table[ip] ?? null;
    },
  };
}

export function fakePhotos(
  table: Record<string, RawExif>,
): PhotoDecoder & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async decode(path: string): Promise<RawExif> {
      calls.push(path);
      return table[path] ?? {};
    },
  };
}

export function fakeChecksum(path: string): Promise<string> {
  return Promise.resolve(`md5:${path.split("/").pop() ?? path}`);
}

export function fakeUploader(
  result: UploadResult = { returnCode: 0, err: "" },
): Uploader & { copies: Array<[string, string]> } {
  const copies: Array<[string, string]> = [];
  return {
    copies,
    async copy(localPath: string, destination: string): Promise<UploadResult> {
      copies.push([localPath, destination]);
      return result;
    },
  };
}
