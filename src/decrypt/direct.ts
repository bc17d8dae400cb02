/**
 * In-process decryption through SQLite3 Multiple Ciphers configured for
 * the SQLCipher 4 scheme.
 */

import CipherDatabase from "better-sqlite3-multiple-ciphers";
import type Database from "better-sqlite3";
import { CIPHER_PARAMS } from "../config.js";
import { DecryptionError, errorMessage } from "../errors.js";
import type { DecryptedStore, DecryptionStrategy } from "./types.js";

export type OpenDatabase = (file: string) => Database.Database;

export interface DirectDecryptionOptions {
  /** Opens the store file. Defaults to a better-sqlite3-multiple-ciphers handle. */
  openDatabase?: OpenDatabase;
}

// SQLite3MC numbers its HMAC/KDF algorithms: 0 = SHA1, 1 = SHA256, 2 = SHA512
const ALGORITHM_IDS: Record<string, number> = {
  HMAC_SHA1: 0,
  HMAC_SHA256: 1,
  HMAC_SHA512: 2,
  PBKDF2_HMAC_SHA1: 0,
  PBKDF2_HMAC_SHA256: 1,
  PBKDF2_HMAC_SHA512: 2,
};

/**
 * Pragmas applied before the canary query. Cipher selection and
 * parameters come first, the key last.
 */
export function directPragmas(key: string): string[] {
  return [
    "cipher = 'sqlcipher'",
    "legacy = 4",
    `legacy_page_size = ${CIPHER_PARAMS.pageSize}`,
    `kdf_iter = ${CIPHER_PARAMS.kdfIterations}`,
    `hmac_algorithm = ${ALGORITHM_IDS[CIPHER_PARAMS.hmacAlgorithm]}`,
    `kdf_algorithm = ${ALGORITHM_IDS[CIPHER_PARAMS.kdfAlgorithm]}`,
    `key = "x'${key}'"`,
  ];
}

export class DirectDecryption implements DecryptionStrategy {
  name = "direct" as const;
  private openDatabase: OpenDatabase;

  constructor(options: DirectDecryptionOptions = {}) {
    this.openDatabase =
      options.openDatabase ?? ((file) => new CipherDatabase(file, { fileMustExist: true }));
  }

  open(dbFile: string, key: string): DecryptedStore {
    const db = this.connect(dbFile);

    try {
      for (const pragma of directPragmas(key)) {
        db.pragma(pragma);
      }
      // canary: a wrong key only surfaces on the first real read
      db.prepare("SELECT count(*) AS count FROM sqlite_master").get();
    } catch (err) {
      db.close();
      throw new DecryptionError(`Automatic decryption failed: ${errorMessage(err)}`, [
        "Ensure Signal Desktop is closed",
        "Try running with the --manual flag",
      ]);
    }

    return {
      db,
      strategy: this.name,
      close: () => db.close(),
    };
  }

  private connect(dbFile: string): Database.Database {
    try {
      return this.openDatabase(dbFile);
    } catch (err) {
      throw new DecryptionError(`Could not open ${dbFile}: ${errorMessage(err)}`);
    }
  }
}
