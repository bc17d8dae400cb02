/**
 * Fixed parameters of the Signal Desktop store and export defaults.
 */

import { join } from "path";
import { ConfigError } from "./errors.js";

/**
 * Cipher settings of Signal Desktop's SQLCipher 4 database. Each strategy
 * renders these in its own pragma dialect.
 */
export const CIPHER_PARAMS = {
  pageSize: 4096,
  kdfIterations: 64000,
  hmacAlgorithm: "HMAC_SHA512",
  kdfAlgorithm: "PBKDF2_HMAC_SHA512",
} as const;

/** config.json fields that have held the key, in lookup order. */
export const KEY_FIELDS = ["key", "encryptionKey", "safeStorageKey", "encrypted_key"] as const;

export const MIN_KEY_LENGTH = 32;

export const DATABASE_PATH = join("sql", "db.sqlite");
export const CONFIG_FILE = "config.json";
export const ATTACHMENTS_DIR = "attachments.noindex";

/** Plaintext copy written beside the encrypted store in external mode. */
export const DECRYPTED_SIBLING = "db-decrypt.sqlite";

export const DEFAULT_SQLCIPHER_BIN = "sqlcipher";
export const DEFAULT_DEST = "output";
export const DEFAULT_MESSAGES_PER_PAGE = 100;

export const TRANSCRIPT_FILE = "index.md";
export const HTML_FILE = "index.html";
export const MEDIA_DIR = "media";
export const STYLESHEET = "style.css";

export const IMAGE_EXTENSIONS = new Set(["png", "jpg", "jpeg", "gif", "tif", "tiff"]);

/**
 * Default Signal Desktop directory for a platform.
 */
export function resolveSourceDir(platform: NodeJS.Platform, home: string): string {
  switch (platform) {
    case "linux":
      return join(home, ".config", "Signal");
    case "darwin":
      return join(home, "Library", "Application Support", "Signal");
    case "win32":
      return join(home, "AppData", "Roaming", "Signal");
    default:
      throw new ConfigError(`Unsupported platform: ${platform}`, [
        "Specify the Signal directory with --source PATH",
        "The directory should contain 'sql/db.sqlite' and 'config.json'",
      ]);
  }
}
