/**
 * Previous exports kept as ZIP archives are unpacked to a temporary
 * directory before merging.
 */

import { createWriteStream, existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, statSync } from "fs";
import { dirname, join, resolve, sep } from "path";
import { tmpdir } from "os";
import { pipeline } from "stream/promises";
import * as yauzl from "yauzl";
import { TRANSCRIPT_FILE } from "../config.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";

/** Prefix of the temporary directories old archives are unpacked into. */
export const EXTRACT_PREFIX = "signal-archive-old-";

/**
 * Unpack every entry of `zipPath` below `target`. The archive is closed
 * whether extraction succeeds or fails; `target` is left to the caller.
 */
export function extractZip(zipPath: string, target: string): Promise<void> {
  const root = resolve(target);

  return new Promise((done, reject) => {
    yauzl.open(zipPath, { lazyEntries: true, autoClose: false }, (openErr, zipFile) => {
      if (openErr || !zipFile) {
        reject(openErr ?? new Error(`Could not open ${zipPath}`));
        return;
      }

      let closed = false;
      const close = (): void => {
        if (closed) return;
        closed = true;
        zipFile.close();
      };
      const fail = (err: Error): void => {
        close();
        reject(err);
      };

      zipFile.on("error", fail);
      zipFile.on("end", () => {
        close();
        done();
      });

      zipFile.on("entry", (entry: yauzl.Entry) => {
        const outputPath = resolve(root, entry.fileName);
        if (outputPath !== root && !outputPath.startsWith(root + sep)) {
          fail(new Error(`ZIP entry escapes the archive: ${entry.fileName}`));
          return;
        }
        if (entry.fileName.endsWith("/")) {
          mkdirSync(outputPath, { recursive: true });
          zipFile.readEntry();
          return;
        }

        mkdirSync(dirname(outputPath), { recursive: true });
        zipFile.openReadStream(entry, (streamErr, readStream) => {
          if (streamErr || !readStream) {
            fail(streamErr ?? new Error(`Could not read ${entry.fileName}`));
            return;
          }
          pipeline(readStream, createWriteStream(outputPath))
            .then(() => zipFile.readEntry())
            .catch(fail);
        });
      });

      zipFile.readEntry();
    });
  });
}

/**
 * An archive whose only top-level entry is a wrapper directory (not itself
 * a conversation) is unwrapped to it.
 */
export function unwrapSingleDirectory(dir: string): string {
  const entries = readdirSync(dir).filter((e) => !e.startsWith("."));
  if (entries.length === 1) {
    const only = join(dir, entries[0]);
    if (statSync(only).isDirectory() && !existsSync(join(only, TRANSCRIPT_FILE))) return only;
  }
  return dir;
}

/**
 * Run fn with a directory holding the old export. ZIP archives are
 * extracted first and removed afterwards.
 */
export async function withOldExport<T>(
  oldPath: string,
  fn: (dir: string) => T,
  logger: Logger = silentLogger,
): Promise<T> {
  if (!oldPath.toLowerCase().endsWith(".zip") || !existsSync(oldPath)) {
    return fn(oldPath);
  }

  logger.step("Extracting old export archive...");
  const tempDir = mkdtempSync(join(tmpdir(), EXTRACT_PREFIX));
  try {
    await extractZip(oldPath, tempDir);
    const dir = unwrapSingleDirectory(tempDir);
    logger.info(`Extracted to ${dir}`);
    return fn(dir);
  } finally {
    rmSync(tempDir, { recursive: true, force: true });
  }
}
