/**
 * Content checksum used as the de-duplicated reference token for a photo.
 */

import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

/** MD5 hex digest of a file, streamed from disk. */
export async function md5File(path: string): Promise<string> {
  const hash = createHash("md5");
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}
