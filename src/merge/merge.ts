/**
 * One-directional merge of an older export into a new one. Nothing in the
 * new export is deleted or overwritten: missing media files are copied in
 * and transcripts gain the old lines they lack.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from "fs";
import { join } from "path";
import { MEDIA_DIR, TRANSCRIPT_FILE } from "../config.js";
import { MergeError, errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import { copyPreservingTimes } from "../export/attachments.js";
import { parseTranscript, serializeLine, splitLines } from "../transcript/grammar.js";
import type { TranscriptEntry } from "../transcript/grammar.js";

export interface AttachmentMergeResult {
  copied: number;
  skipped: number;
}

export type TranscriptMergeResult =
  | { status: "merged"; old: number; new: number; total: number }
  | { status: "copied-old" }
  | { status: "unchanged"; reason: "old-missing" | "new-missing" | "old-empty" | "both-empty" | "no-messages" };

export interface ExportMergeResult {
  merged: string[];
  /** In the new export only: nothing to merge. */
  skipped: string[];
  /** In the old export only: not carried over. */
  oldOnly: string[];
  failed: string[];
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * Copy files present in oldMedia but absent by name from newMedia.
 */
export function mergeAttachments(
  newMedia: string,
  oldMedia: string,
  logger: Logger = silentLogger,
): AttachmentMergeResult {
  const result: AttachmentMergeResult = { copied: 0, skipped: 0 };
  if (!existsSync(oldMedia)) {
    logger.info("\t\tNo old media directory to merge");
    return result;
  }
  if (!statSync(oldMedia).isDirectory()) {
    logger.warn(`\t\tOld media path is not a directory: ${oldMedia}`);
    return result;
  }

  mkdirSync(newMedia, { recursive: true });

  for (const name of readdirSync(oldMedia)) {
    const from = join(oldMedia, name);
    if (!statSync(from).isFile()) continue;
    const to = join(newMedia, name);
    if (existsSync(to)) {
      logger.info(`\t\tSkipping existing file: ${name}`);
      result.skipped++;
      continue;
    }
    copyPreservingTimes(from, to);
    result.copied++;
  }
  return result;
}

function terminatedLine(entry: TranscriptEntry): string {
  const line = serializeLine(entry);
  return line.endsWith("\n") ? line : `${line}\n`;
}

/**
 * Old entries followed by new ones, dropping any entry whose full text was
 * already seen. Order within each side is kept. A last line without its
 * newline gets one so it cannot run into the next entry.
 */
export function mergeEntries(oldEntries: TranscriptEntry[], newEntries: TranscriptEntry[]): string[] {
  return [...new Set([...oldEntries, ...newEntries].map(terminatedLine))];
}

/**
 * Merge an old transcript into a new one, rewriting the new file.
 */
export function mergeTranscript(
  newFile: string,
  oldFile: string,
  logger: Logger = silentLogger,
): TranscriptMergeResult {
  if (!existsSync(oldFile)) {
    logger.info(`\t\tOld chat file not found: ${oldFile}`);
    return { status: "unchanged", reason: "old-missing" };
  }
  if (!existsSync(newFile)) {
    logger.warn(`\t\tNew chat file not found: ${newFile}`);
    return { status: "unchanged", reason: "new-missing" };
  }

  const oldText = readFileSync(oldFile, "utf-8");
  const newText = readFileSync(newFile, "utf-8");

  if (!oldText && !newText) {
    logger.warn("\t\tBoth chat files are empty");
    return { status: "unchanged", reason: "both-empty" };
  }
  if (!oldText) {
    logger.info("\t\tOld chat file is empty");
    return { status: "unchanged", reason: "old-empty" };
  }
  if (!newText) {
    logger.info("\t\tNew chat file is empty, using old only");
    writeFileSync(newFile, oldText, "utf-8");
    return { status: "copied-old" };
  }

  const oldEntries = parseTranscript(splitLines(oldText), logger);
  const newEntries = parseTranscript(splitLines(newText), logger);
  if (oldEntries.length === 0 && newEntries.length === 0) {
    logger.warn("\t\tNo messages found in either file");
    return { status: "unchanged", reason: "no-messages" };
  }

  const merged = mergeEntries(oldEntries, newEntries);
  logger.info(
    `\t\tMerged ${oldEntries.length} old + ${newEntries.length} new = ${merged.length} total messages`,
  );
  writeFileSync(newFile, merged.join(""), "utf-8");
  return { status: "merged", old: oldEntries.length, new: newEntries.length, total: merged.length };
}

/**
 * Merge every conversation directory of `dest` with its counterpart in
 * `old`. Directories only present in `old` are reported, not copied. A failure in one
 * conversation is logged and the others still merge.
 */
export function mergeExports(dest: string, old: string, logger: Logger = silentLogger): ExportMergeResult {
  if (!existsSync(old)) {
    throw new MergeError(`Old export directory not found: ${old}`, ["Cannot perform merge operation"]);
  }
  if (!statSync(old).isDirectory()) {
    throw new MergeError(`Old export path is not a directory: ${old}`);
  }
  if (!isDirectory(dest)) {
    throw new MergeError(`New export directory not found: ${dest}`, ["Cannot perform merge operation"]);
  }

  logger.info(`Merging old export from: ${old}`);
  logger.info(`Into new export at: ${dest}`);

  const result: ExportMergeResult = { merged: [], skipped: [], oldOnly: [], failed: [] };
  for (const name of readdirSync(dest).sort()) {
    const dirNew = join(dest, name);
    if (!statSync(dirNew).isDirectory()) continue;

    const dirOld = join(old, name);
    if (!isDirectory(dirOld)) {
      logger.info(`\tSkipping ${name} (not in old export)`);
      result.skipped.push(name);
      continue;
    }

    logger.info(`\tMerging conversation: ${name}`);
    try {
      mergeAttachments(join(dirNew, MEDIA_DIR), join(dirOld, MEDIA_DIR), logger);
      mergeTranscript(join(dirNew, TRANSCRIPT_FILE), join(dirOld, TRANSCRIPT_FILE), logger);
      result.merged.push(name);
    } catch (err) {
      logger.error(`\t\tError merging ${name}: ${errorMessage(err)}`);
      result.failed.push(name);
    }
  }

  for (const name of readdirSync(old).sort()) {
    if (!isDirectory(join(old, name)) || isDirectory(join(dest, name))) continue;
    logger.info(`\tSkipping ${name} (not in new export)`);
    result.oldOnly.push(name);
  }

  logger.step(
    `Merge complete: ${result.merged.length} conversations merged, ${result.skipped.length + result.oldOnly.length} skipped`,
  );
  return result;
}
