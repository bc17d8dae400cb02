/**
 * Opens the encrypted store with the strategy selected by mode.
 */

import { DecryptionError } from "../errors.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import { DirectDecryption } from "./direct.js";
import { ExternalToolDecryption } from "./external.js";
import type { DecryptedStore, DecryptionMode, DecryptionStrategy } from "./types.js";

export interface OpenStoreOptions {
  dbFile: string;
  key: string;
  mode?: DecryptionMode;
  direct?: DecryptionStrategy;
  external?: DecryptionStrategy;
  logger?: Logger;
}

/**
 * In "auto" mode a DecryptionError from the direct strategy escalates to
 * the external one exactly once. Whatever the last strategy throws is fatal.
 */
export function openStore(options: OpenStoreOptions): DecryptedStore {
  const { dbFile, key, mode = "auto", logger = silentLogger } = options;
  const direct = options.direct ?? new DirectDecryption();
  const external = options.external ?? new ExternalToolDecryption({ logger });

  if (mode === "external") {
    logger.info("Mode: manual decryption");
    return external.open(dbFile, key);
  }

  if (mode === "direct") {
    return direct.open(dbFile, key);
  }

  try {
    return direct.open(dbFile, key);
  } catch (err) {
    if (!(err instanceof DecryptionError)) throw err;
    logger.warn(err.message);
    logger.warn("Falling back to manual decryption mode...");
  }
  return external.open(dbFile, key);
}

/**
 * Run fn against an opened store and close it afterwards, whether fn
 * succeeds or throws.
 */
export function withStore<T>(options: OpenStoreOptions, fn: (store: DecryptedStore) => T): T {
  const store = openStore(options);
  try {
    return fn(store);
  } finally {
    store.close();
  }
}
