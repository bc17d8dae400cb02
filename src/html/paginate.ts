/**
 * Paginated HTML rendering of transcripts. Reads `index.md` from every
 * conversation directory and writes `index.html` beside it.
 */

import { copyFileSync, existsSync, readdirSync, readFileSync, statSync, writeFileSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { DEFAULT_MESSAGES_PER_PAGE, HTML_FILE, STYLESHEET, TRANSCRIPT_FILE } from "../config.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import { parseTranscript, senderName, splitDateToken, splitLines } from "../transcript/grammar.js";
import type { TranscriptEntry } from "../transcript/grammar.js";
import { ME } from "../export/transcript.js";
import { renderBody } from "./markdown.js";
import { escapeHtml, pageFoot, pageHead, pageNav } from "./templates.js";

export const BUNDLED_STYLESHEET = fileURLToPath(new URL(`../../assets/${STYLESHEET}`, import.meta.url));

export function renderEntry(entry: TranscriptEntry): string {
  const { day, time } = splitDateToken(entry.date);
  const sender = senderName(entry.sender);
  const cls = sender === ME ? "msg me" : "msg";
  return (
    `<div class='${cls}'><span class=date>${day}</span><span class=time>${time}</span>` +
    `<span class=sender>${escapeHtml(sender)}</span>` +
    `<span class=body>${renderBody(entry.body)}</span></div>`
  );
}

/**
 * Full HTML document for one conversation, `perPage` messages per page.
 */
export function renderConversationHtml(
  title: string,
  entries: TranscriptEntry[],
  perPage: number = DEFAULT_MESSAGES_PER_PAGE,
): string {
  if (!Number.isInteger(perPage) || perPage < 1) {
    throw new RangeError(`Messages per page must be a positive integer, got ${perPage}`);
  }

  const parts = [pageHead(title)];
  const lastPage = Math.max(Math.ceil(entries.length / perPage) - 1, 0);

  for (let page = 0; page * perPage < entries.length; page++) {
    parts.push(`<div class=page id=pg${page}>`);
    parts.push(pageNav(page, lastPage));
    for (const entry of entries.slice(page * perPage, (page + 1) * perPage)) {
      parts.push(renderEntry(entry));
    }
    parts.push("</div>");
  }

  parts.push(pageFoot());
  return parts.join("\n");
}

export interface CreateHtmlOptions {
  perPage?: number;
  stylesheet?: string;
  logger?: Logger;
}

export function copyStylesheet(dest: string, source: string, logger: Logger = silentLogger): boolean {
  const target = join(dest, STYLESHEET);
  if (!existsSync(source)) {
    logger.warn(`Stylesheet not found: ${source}`);
    logger.warn("HTML files will be created without styling.");
    logger.warn(`You can add a stylesheet manually at: ${target}`);
    return false;
  }
  copyFileSync(source, target);
  return true;
}

/**
 * Write `index.html` for every conversation directory under `dest`.
 * Returns the directory names rendered.
 */
export function createHtml(dest: string, options: CreateHtmlOptions = {}): string[] {
  const { perPage = DEFAULT_MESSAGES_PER_PAGE, stylesheet = BUNDLED_STYLESHEET } = options;
  const logger = options.logger ?? silentLogger;

  copyStylesheet(dest, stylesheet, logger);

  const rendered: string[] = [];
  for (const name of readdirSync(dest).sort()) {
    const dir = join(dest, name);
    if (!statSync(dir).isDirectory()) continue;
    logger.info(`\tDoing html for ${name}`);

    const transcript = join(dir, TRANSCRIPT_FILE);
    if (!existsSync(transcript)) writeFileSync(transcript, "", "utf-8");

    const entries = parseTranscript(splitLines(readFileSync(transcript, "utf-8")), logger);
    writeFileSync(join(dir, HTML_FILE), renderConversationHtml(name, entries, perPage), "utf-8");
    rendered.push(name);
  }
  return rendered;
}
