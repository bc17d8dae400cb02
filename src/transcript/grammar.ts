/**
 * Transcript line grammar, version 1.
 *
 *   transcript   = *logical-line
 *   logical-line = header-line *continuation
 *   header-line  = "[" YYYY-MM-DD ["," ] " " HH:MM "]" sender ":" text LF
 *   continuation = any line that does not match header-line
 *
 * The renderer and the parser both live here so they cannot drift apart.
 * A body line that would read as a header is written with a leading
 * backslash (Markdown shows `\[` as `[`), so a message never splits.
 *
 * Parsed tokens keep their exact text: `date` includes the brackets,
 * `sender` includes the leading space and trailing colon, and `body`
 * includes the line terminators. `serializeLine` concatenates them again,
 * which makes parse followed by serialize lossless.
 */

import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";

export const TRANSCRIPT_FORMAT_VERSION = 1;

const HEADER = /^(\[\d{4}-\d{2}-\d{2},? \d{2}:\d{2}\])(.*?:)([\s\S]*)$/;
const HEADER_LIKE = /^\[\d{4}-\d{2}-\d{2},? \d{2}:\d{2}\].*?:/;

export interface TranscriptEntry {
  date: string;
  sender: string;
  body: string;
}

export interface LineValues {
  /** `YYYY-MM-DD HH:MM` */
  date: string;
  sender: string;
  /** Message text, may contain newlines. */
  body: string;
}

/**
 * Split text into physical lines, keeping each line's terminator.
 */
export function splitLines(text: string): string[] {
  const lines = text.match(/[^\n]*\n|[^\n]+$/g);
  return lines ?? [];
}

export function isHeaderLine(line: string): boolean {
  return HEADER_LIKE.test(line);
}

/**
 * Escape continuation lines of a body that would parse as headers.
 */
export function escapeBody(body: string): string {
  return body
    .split("\n")
    .map((line, i) => (i > 0 && isHeaderLine(line) ? `\\${line}` : line))
    .join("\n");
}

/**
 * Canonical logical line for one message, terminated by a newline.
 */
export function formatLine(values: LineValues): string {
  return `[${values.date}] ${values.sender}: ${escapeBody(values.body)}\n`;
}

/**
 * Group physical lines into logical entries. A line before the first
 * header has nothing to attach to and is dropped with a warning.
 */
export function parseTranscript(lines: string[], logger: Logger = silentLogger): TranscriptEntry[] {
  const entries: TranscriptEntry[] = [];
  for (const line of lines) {
    const match = HEADER.exec(line);
    if (match) {
      entries.push({ date: match[1], sender: match[2], body: match[3] });
      continue;
    }
    const last = entries[entries.length - 1];
    if (last) {
      last.body += line;
    } else {
      logger.warn(`Skipping malformed line (no previous message): ${line.slice(0, 50)}...`);
    }
  }
  return entries;
}

export function serializeLine(entry: TranscriptEntry): string {
  return entry.date + entry.sender + entry.body;
}

/**
 * `[2024-01-01 10:00]` → `{ day: "2024-01-01", time: "10:00" }`
 */
export function splitDateToken(token: string): { day: string; time: string } {
  const [day = "", time = ""] = token.slice(1, -1).replace(",", "").split(" ");
  return { day, time };
}

/**
 * ` Alice:` → `Alice`
 */
export function senderName(token: string): string {
  return token.slice(1, -1);
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Whether `ms` formats as a header date: a valid Date whose local year has
 * four digits.
 */
export function isFormattableTime(ms: number): boolean {
  const year = new Date(ms).getFullYear();
  return !Number.isNaN(year) && year >= 0 && year <= 9999;
}

/** Local `YYYY-MM-DD`. */
export function formatDay(ms: number): string {
  const d = new Date(ms);
  return `${String(d.getFullYear()).padStart(4, "0")}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Local `YYYY-MM-DD HH:MM`. */
export function formatMinute(ms: number): string {
  const d = new Date(ms);
  return `${formatDay(ms)} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}
