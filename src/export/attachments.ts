/**
 * Attachment naming and copying.
 *
 * Every attachment is renamed once, when the plan is built, to
 * `{date}_{index}_{fileName}`, unique within its conversation. The copier and the transcript renderer both
 * read names from the plan and never look at the original file name again.
 */

import { copyFileSync, existsSync, mkdirSync, statSync, utimesSync } from "fs";
import { extname, join } from "path";
import { ATTACHMENTS_DIR, MEDIA_DIR } from "../config.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import type { Attachment, ContactMap, ConversationMap, Message } from "../model/types.js";
import { formatDay, isFormattableTime } from "../transcript/grammar.js";
import type { DirectoryIndex } from "./directories.js";

export interface PlannedAttachment {
  /** Posix path relative to attachments.noindex, null when the record has none. */
  sourcePath: string | null;
  exportName: string;
}

export type AttachmentPlan = Map<Message, PlannedAttachment[]>;

export interface CopyResult {
  copied: number;
  missing: number;
}

/**
 * `timestamp`, else `sent_at`. A value no header date can show counts as
 * missing.
 */
export function messageTime(message: Message): number | null {
  for (const time of [message.timestamp, message.sent_at]) {
    if (typeof time === "number" && isFormattableTime(time)) return time;
  }
  return null;
}

/**
 * `2024-03-01`, 0, `my photo.jpg` → `2024-03-01_00_my_photo.jpg`
 */
export function exportName(day: string, index: number, fileName: string): string {
  return `${day}_${String(index).padStart(2, "0")}_${fileName}`.replace(/ /g, "_").replace(/\//g, "-");
}

/**
 * Stored paths sometimes carry Windows separators.
 */
export function normalizeAttachmentPath(path: string): string {
  return path.replace(/\\/g, "/");
}

/**
 * `name`, or `name` with `_2`, `_3`, ... before its extension when an
 * earlier attachment of the conversation already took it.
 */
export function claimName(name: string, taken: Set<string>): string {
  const ext = extname(name);
  const stem = name.slice(0, name.length - ext.length);
  let candidate = name;
  for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
    candidate = `${stem}_${n}${ext}`;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}

function planMessage(
  message: Message,
  label: string,
  taken: Set<string>,
  logger: Logger,
): PlannedAttachment[] {
  const attachments: Attachment[] = message.attachments ?? [];
  if (attachments.length === 0) return [];

  const day = formatDay(messageTime(message) ?? 0);
  const planned: PlannedAttachment[] = [];
  attachments.forEach((attachment, i) => {
    if (!attachment.fileName) {
      logger.info(`\t\tBroken attachment:\t${label}\t${attachment.path ?? "(no path)"}`);
      return;
    }
    planned.push({
      sourcePath: attachment.path ? normalizeAttachmentPath(attachment.path) : null,
      exportName: claimName(exportName(day, i, attachment.fileName), taken),
    });
  });
  return planned;
}

export function planAttachments(
  conversations: ConversationMap,
  contacts: ContactMap,
  logger: Logger = silentLogger,
): AttachmentPlan {
  const plan: AttachmentPlan = new Map();
  for (const [id, messages] of conversations) {
    const label = contacts.get(id)?.name ?? id;
    const taken = new Set<string>();
    for (const message of messages) {
      const planned = planMessage(message, label, taken, logger);
      if (planned.length > 0) plan.set(message, planned);
    }
  }
  return plan;
}

export interface CopyAttachmentsOptions {
  sourceDir: string;
  dest: string;
  conversations: ConversationMap;
  directories: DirectoryIndex;
  plan: AttachmentPlan;
  logger?: Logger;
}

/**
 * Copy planned attachments into `<dest>/<dir>/media`. A missing source file
 * is logged and skipped; the transcript still references it.
 */
export function copyAttachments(options: CopyAttachmentsOptions): CopyResult {
  const { sourceDir, dest, conversations, directories, plan } = options;
  const logger = options.logger ?? silentLogger;
  const store = join(sourceDir, ATTACHMENTS_DIR);
  const result: CopyResult = { copied: 0, missing: 0 };

  for (const [id, messages] of conversations) {
    const dir = directories.get(id);
    if (!dir) continue;
    logger.info(`\tCopying attachments for: ${dir}`);

    const media = join(dest, dir, MEDIA_DIR);
    mkdirSync(media, { recursive: true });

    for (const message of messages) {
      for (const attachment of plan.get(message) ?? []) {
        const from = attachment.sourcePath === null ? null : join(store, attachment.sourcePath);
        if (from === null || !existsSync(from)) {
          logger.info(`\t\tAttachment not found:\t${dir} ${attachment.exportName}`);
          result.missing++;
          continue;
        }
        try {
          copyPreservingTimes(from, join(media, attachment.exportName));
          result.copied++;
        } catch (err) {
          logger.warn(`\t\tCould not copy ${attachment.exportName}: ${errorMessage(err)}`);
          result.missing++;
        }
      }
    }
  }
  return result;
}

export function copyPreservingTimes(from: string, to: string): void {
  copyFileSync(from, to);
  const { atime, mtime } = statSync(from);
  utimesSync(to, atime, mtime);
}
