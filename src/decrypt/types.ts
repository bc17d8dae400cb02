/**
 * Decryption strategies turn the encrypted Signal store into a queryable
 * better-sqlite3 handle. The gateway picks one by mode and escalates from
 * direct to external at most once.
 */

import type Database from "better-sqlite3";

export type DecryptionMode = "auto" | "direct" | "external";

export type StrategyName = Exclude<DecryptionMode, "auto">;

export interface DecryptedStore {
  db: Database.Database;
  strategy: StrategyName;
  /** Close the handle and remove anything the strategy left on disk. */
  close(): void;
}

export interface DecryptionStrategy {
  name: StrategyName;
  open(dbFile: string, key: string): DecryptedStore;
}
