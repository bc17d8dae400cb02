/**
 * Markdown transcript renderer: one logical line per message, appended to
 * `<dest>/<dir>/index.md` in message order.
 */

import { appendFileSync, mkdirSync } from "fs";
import { extname, join } from "path";
import { IMAGE_EXTENSIONS, MEDIA_DIR, TRANSCRIPT_FILE } from "../config.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import type { Contact, ContactMap, ConversationMap, Message } from "../model/types.js";
import { formatLine, formatMinute } from "../transcript/grammar.js";
import type { AttachmentPlan } from "./attachments.js";
import { messageTime } from "./attachments.js";
import type { DirectoryIndex } from "./directories.js";

export const ME = "Me";
export const NO_SENDER = "No-Sender";
export const EPOCH_DATE = "1970-01-01 00:00";

export function isImage(fileName: string): boolean {
  return IMAGE_EXTENSIONS.has(extname(fileName).slice(1).toLowerCase());
}

/**
 * `![name](./media/name)  ` for images, `[name](./media/name)  ` otherwise.
 */
export function attachmentReference(fileName: string): string {
  const target = `./${MEDIA_DIR}/${fileName}`.replace(/ /g, "%20");
  return `${isImage(fileName) ? "!" : ""}[${fileName}](${target})  `;
}

export function resolveSender(message: Message, contact: Contact, contacts: ContactMap): string {
  if (message.type === "outgoing") return ME;

  if (contact.isGroup) {
    if (!message.source) return NO_SENDER;
    // several contacts can share a number; the last one in catalog order wins
    let sender = NO_SENDER;
    for (const candidate of contacts.values()) {
      if (candidate.number !== null && candidate.number === message.source) {
        sender = candidate.name ?? NO_SENDER;
      }
    }
    return sender;
  }
  return contact.name ?? NO_SENDER;
}

/**
 * Backticks would open code spans; the two trailing spaces force a
 * Markdown line break.
 */
export function formatBody(body: string | null | undefined): string {
  return `${(body ?? "").replace(/`/g, "")}  `;
}

export interface RenderContext {
  contacts: ContactMap;
  plan: AttachmentPlan;
  logger: Logger;
}

export function renderMessage(message: Message, contact: Contact, context: RenderContext): string {
  const time = messageTime(message);
  let date = EPOCH_DATE;
  if (time === null) {
    context.logger.info(`\t\tNo usable timestamp or sent_at; date set to 1970`);
  } else {
    date = formatMinute(time);
  }

  let body = formatBody(message.body);
  for (const attachment of context.plan.get(message) ?? []) {
    body += attachmentReference(attachment.exportName);
  }

  return formatLine({ date, sender: resolveSender(message, contact, context.contacts), body });
}

export interface RenderTranscriptsOptions {
  dest: string;
  contacts: ContactMap;
  conversations: ConversationMap;
  directories: DirectoryIndex;
  plan: AttachmentPlan;
  logger?: Logger;
}

/**
 * Append every conversation's lines to its transcript. Returns the number
 * of lines written.
 */
export function renderTranscripts(options: RenderTranscriptsOptions): number {
  const { dest, contacts, conversations, directories, plan } = options;
  const logger = options.logger ?? silentLogger;
  const context: RenderContext = { contacts, plan, logger };
  let written = 0;

  for (const [id, messages] of conversations) {
    const contact = contacts.get(id);
    const dir = directories.get(id);
    if (!contact || !dir) continue;
    logger.info(`\tDoing markdown for: ${dir}`);

    const lines = messages.map((message) => renderMessage(message, contact, context));
    mkdirSync(join(dest, dir), { recursive: true });
    appendFileSync(join(dest, dir, TRANSCRIPT_FILE), lines.join(""), "utf-8");
    written += lines.length;
  }
  return written;
}
