/**
 * Report upload through `rclone copy`.
 */

import { spawn } from "node:child_process";
import { basename } from "node:path";
import { ReportError } from "../errors.js";
import type { ProjectRecord } from "../records/index.js";

export interface UploadResult {
  returnCode: number;
  /** Captured stderr, or the spawn error message. */
  err: string;
}

export interface Uploader {
  copy(localPath: string, destination: string): Promise<UploadResult>;
}

export interface RcloneOptions {
  /** Executable; "rclone" on PATH by default. */
  command?: string;
}

export function createRcloneUploader(options: RcloneOptions = {}): Uploader {
  const command = options.command ?? "rclone";
  return {
    copy(localPath: string, destination: string): Promise<UploadResult> {
      return new Promise((resolvePromise) => {
        const child = spawn(command, ["copy", localPath, destination], {
          stdio: ["ignore", "ignore", "pipe"],
        });
        let stderr = "";
        child.stderr.setEncoding("utf8");
        child.stderr.on("data", (chunk: string) => {
          stderr += chunk;
        });
        child.on("error", (e) => {
          resolvePromise({ returnCode: 127, err: e.message });
        });
        child.on("close", (code) => {
          resolvePromise({ returnCode: code ?? 1, err: stderr.trim() });
        });
      });
    },
  };
}

/** `<remote><dir>/<project name>`, e.g. `report:/Data Collection/Maple`. */
export function uploadDestination(
  remote: string,
  dir: string,
  project: ProjectRecord,
): string {
  return `${remote}${dir.replace(/\/+$/, "")}/${project.name}`;
}

/** Copy the report; a non-zero return code is UPLOAD_FAILED. */
export async function uploadReport(
  uploader: Uploader,
  reportPath: string,
  destination: string,
): Promise<void> {
  const result = await uploader.copy(reportPath, destination);
  if (result.returnCode !== 0) {
    throw new ReportError(
      `Upload of ${basename(reportPath)} failed with code ${result.returnCode}: ${result.err}`,
      "UPLOAD_FAILED",
      { reportPath, destination, returnCode: result.returnCode },
    );
  }
}
