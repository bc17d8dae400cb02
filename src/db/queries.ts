/**
 * Prepared queries against the decrypted Signal database.
 * Every user-supplied value is bound, never spliced into SQL.
 */

import type Database from "better-sqlite3";

export interface ConversationRow {
  type: string | null;
  id: string;
  e164: string | null;
  name: string | null;
  profileName: string | null;
  members: string | null;
}

export interface MemberRow {
  name: string | null;
  profileName: string | null;
}

export interface MessageRow {
  json: string;
  conversationId: string | null;
}

/**
 * Catalog rows, optionally restricted to conversations whose name or
 * profile name equals one of the given chat names.
 */
export function queryConversations(db: Database.Database, chats?: string[]): ConversationRow[] {
  const base = "SELECT type, id, e164, name, profileName, members FROM conversations";
  if (chats === undefined) {
    return db.prepare(base).all() as ConversationRow[];
  }
  if (chats.length === 0) return [];

  const placeholders = chats.map(() => "?").join(", ");
  const stmt = db.prepare(
    `${base} WHERE name IN (${placeholders}) OR profileName IN (${placeholders})`,
  );
  return stmt.all(...chats, ...chats) as ConversationRow[];
}

/**
 * Name fields of a single catalog entry, used to resolve group members.
 */
export function queryMember(db: Database.Database, id: string): MemberRow | undefined {
  return db
    .prepare("SELECT name, profileName FROM conversations WHERE id = ?")
    .get(id) as MemberRow | undefined;
}

/**
 * All messages in send order; ties keep storage order.
 */
export function queryMessages(db: Database.Database): IterableIterator<MessageRow> {
  return db
    .prepare("SELECT json, conversationId FROM messages ORDER BY sent_at, rowid")
    .iterate() as IterableIterator<MessageRow>;
}
