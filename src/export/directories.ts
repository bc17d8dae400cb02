/**
 * Contact names double as labels and directory names in an export. The
 * directory index maps contact ids to distinct directory names so two
 * contacts whose names sanitize alike do not share a folder.
 */

import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import type { ContactMap } from "../model/types.js";

export const UNNAMED = "None";

/**
 * Keep only letters and digits (any script).
 */
export function sanitizeName(name: string): string {
  return Array.from(name)
    .filter((ch) => /[\p{L}\p{N}]/u.test(ch))
    .join("");
}

/**
 * Copies of the contacts with file-system friendly names. The label is the
 * name, or the number when there is no name.
 */
export function sanitizeContacts(contacts: ContactMap): ContactMap {
  const result: ContactMap = new Map();
  for (const [id, contact] of contacts) {
    const label = contact.name ?? contact.number;
    const clean = label === null ? "" : sanitizeName(label);
    result.set(id, { ...contact, name: clean || UNNAMED });
  }
  return result;
}

/** Contact id → directory name under the export root. */
export type DirectoryIndex = Map<string, string>;

/**
 * Assign each contact a directory named after its sanitized label. When a
 * label is taken, later contacts get `_2`, `_3`, ... in map order.
 */
export function assignDirectories(contacts: ContactMap, logger: Logger = silentLogger): DirectoryIndex {
  const index: DirectoryIndex = new Map();
  const taken = new Set<string>();

  for (const [id, contact] of contacts) {
    const base = contact.name ?? UNNAMED;
    let dir = base;
    for (let n = 2; taken.has(dir.toLowerCase()); n++) {
      dir = `${base}_${n}`;
    }
    if (dir !== base) {
      logger.warn(`\tName collision: ${base} (${id}) exported as ${dir}`);
    }
    // case-insensitive file systems would merge Ann and ann
    taken.add(dir.toLowerCase());
    index.set(id, dir);
  }
  return index;
}

/**
 * Sorted display names, as printed by --list-chats.
 */
export function listChatNames(contacts: ContactMap): string[] {
  const names: string[] = [];
  for (const contact of contacts.values()) {
    if (contact.name !== null) names.push(contact.name);
  }
  return names.sort();
}
