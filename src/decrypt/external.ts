/**
 * Fallback decryption through the sqlcipher command-line tool.
 *
 * The tool exports the store into a plaintext sibling database which is
 * then opened read-only. The sibling is deleted before the export and again
 * when the store is closed.
 */

import { spawnSync } from "child_process";
import { existsSync, rmSync } from "fs";
import { dirname, join } from "path";
import Database from "better-sqlite3";
import { CIPHER_PARAMS, DECRYPTED_SIBLING, DEFAULT_SQLCIPHER_BIN } from "../config.js";
import { DecryptionError, ToolMissingError, errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import type { DecryptedStore, DecryptionStrategy } from "./types.js";

export interface ExternalDecryptionOptions {
  binary?: string;
  platform?: NodeJS.Platform;
  logger?: Logger;
}

/**
 * SQL piped to the tool: unlock, then copy everything into an attached
 * unencrypted database.
 */
export function buildExportScript(key: string, target: string): string {
  const quotedTarget = target.replace(/'/g, "''");
  return [
    `PRAGMA key = "x'${key}'";`,
    `PRAGMA cipher_page_size = ${CIPHER_PARAMS.pageSize};`,
    `PRAGMA kdf_iter = ${CIPHER_PARAMS.kdfIterations};`,
    `PRAGMA cipher_hmac_algorithm = ${CIPHER_PARAMS.hmacAlgorithm};`,
    `PRAGMA cipher_kdf_algorithm = ${CIPHER_PARAMS.kdfAlgorithm};`,
    `ATTACH DATABASE '${quotedTarget}' AS plaintext KEY '';`,
    "SELECT sqlcipher_export('plaintext');",
    "DETACH DATABASE plaintext;",
    "",
  ].join("\n");
}

export function installHint(platform: NodeJS.Platform): string {
  switch (platform) {
    case "darwin":
      return "macOS: brew install sqlcipher";
    case "linux":
      return "Linux: sudo apt install sqlcipher (or the equivalent for your distribution)";
    case "win32":
      return "Windows: download from https://www.zetetic.net/sqlcipher/";
    default:
      return "Install the sqlcipher command-line tool and make sure it is on PATH";
  }
}

export class ExternalToolDecryption implements DecryptionStrategy {
  name = "external" as const;
  private binary: string;
  private platform: NodeJS.Platform;
  private logger: Logger;

  constructor(options: ExternalDecryptionOptions = {}) {
    this.binary = options.binary ?? DEFAULT_SQLCIPHER_BIN;
    this.platform = options.platform ?? process.platform;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Whether the tool can be spawned at all. Its exit status is not checked:
   * only a failure to start means it is absent.
   */
  isAvailable(): boolean {
    const probe = spawnSync(this.binary, ["-version"], { stdio: "ignore" });
    return probe.error === undefined;
  }

  open(dbFile: string, key: string): DecryptedStore {
    if (!this.isAvailable()) {
      throw new ToolMissingError(`${this.binary} CLI not found`, [
        "Manual decryption requires the sqlcipher command-line tool",
        installHint(this.platform),
        "Alternatively, try running without the --manual flag",
      ]);
    }

    const sibling = join(dirname(dbFile), DECRYPTED_SIBLING);
    removeSibling(sibling);

    this.logger.info(`Using manual decryption via ${this.binary}...`);
    const result = spawnSync(this.binary, [dbFile], {
      input: buildExportScript(key, sibling),
      encoding: "utf-8",
    });

    if (result.error) {
      removeSibling(sibling);
      throw new DecryptionError(`Failed to run ${this.binary}: ${result.error.message}`);
    }
    if (result.status !== 0 || !existsSync(sibling)) {
      removeSibling(sibling);
      const detail = result.stderr.trim();
      throw new DecryptionError(
        `Manual decryption failed (exit code ${result.status ?? "none"})${detail ? `: ${detail}` : ""}`,
        [
          "The database key may be incorrect",
          "The database file may be corrupted",
          "Signal Desktop may have changed its encryption format",
        ],
      );
    }

    let db: Database.Database;
    try {
      db = new Database(sibling, { readonly: true, fileMustExist: true });
    } catch (err) {
      removeSibling(sibling);
      throw new DecryptionError(`Could not open decrypted copy: ${errorMessage(err)}`);
    }

    return {
      db,
      strategy: this.name,
      close: () => {
        try {
          db.close();
        } finally {
          removeSibling(sibling);
        }
      },
    };
  }
}

function removeSibling(path: string): void {
  rmSync(path, { force: true });
}
