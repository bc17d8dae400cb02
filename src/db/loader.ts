/**
 * Builds the contact and conversation maps from an opened store.
 */

import type Database from "better-sqlite3";
import { QueryError, errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import { messageSchema } from "../model/types.js";
import type { Contact, ContactMap, ConversationMap, LoadResult } from "../model/types.js";
import { queryConversations, queryMember, queryMessages } from "./queries.js";
import type { ConversationRow } from "./queries.js";

export interface LoadOptions {
  /** Exact chat names to include; all chats when omitted. */
  chats?: string[];
  logger?: Logger;
}

function runQuery<T>(description: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new QueryError(`Failed to query ${description}: ${errorMessage(err)}`, [
      "This usually means the database decryption failed",
      "Ensure Signal Desktop is closed",
      "Try running with the --manual flag",
    ]);
  }
}

/**
 * Display names for a group's whitespace-separated member ids. A member
 * without a catalog entry keeps its raw id.
 */
export function resolveMembers(db: Database.Database, members: string): string[] {
  return members
    .split(/\s+/)
    .filter((id) => id.length > 0)
    .map((id) => {
      const row = runQuery("group members", () => queryMember(db, id));
      return row?.name ?? row?.profileName ?? id;
    });
}

function toContact(db: Database.Database, row: ConversationRow, logger: Logger): Contact {
  const isGroup = row.type === "group";
  const contact: Contact = {
    id: row.id,
    name: row.name ?? row.profileName ?? row.e164,
    number: row.e164,
    profileName: row.profileName,
    isGroup,
  };

  if (isGroup) {
    if (row.members === null) {
      logger.info("\tEmpty group.");
      contact.members = [];
    } else {
      contact.members = resolveMembers(db, row.members);
    }
  }
  return contact;
}

export function loadContacts(
  db: Database.Database,
  chats?: string[],
  logger: Logger = silentLogger,
): ContactMap {
  const rows = runQuery("conversations", () => queryConversations(db, chats));
  const contacts: ContactMap = new Map();
  for (const row of rows) {
    logger.info(`\tLoading SQL results for: ${row.name ?? row.profileName ?? row.id}`);
    contacts.set(row.id, toContact(db, row, logger));
  }
  return contacts;
}

/**
 * Load every message in one pass and bucket it by conversation. Messages
 * of conversations that were not loaded as contacts are dropped.
 */
export function loadConversations(db: Database.Database, options: LoadOptions = {}): LoadResult {
  const logger = options.logger ?? silentLogger;
  const contacts = loadContacts(db, options.chats, logger);

  const conversations: ConversationMap = new Map();
  for (const id of contacts.keys()) {
    conversations.set(id, []);
  }

  runQuery("messages", () => {
    for (const row of queryMessages(db)) {
      if (!row.conversationId) continue;
      const bucket = conversations.get(row.conversationId);
      if (!bucket) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(row.json);
      } catch (err) {
        logger.warn(`\tSkipping message with unreadable JSON: ${errorMessage(err)}`);
        continue;
      }
      const parsed = messageSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn(`\tSkipping malformed message in ${row.conversationId}`);
        continue;
      }
      bucket.push(parsed.data);
    }
  });

  return { contacts, conversations };
}
