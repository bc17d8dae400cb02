/**
 * Reads the Signal Desktop directory: the key from config.json and the
 * location of the encrypted database.
 */

import { existsSync, readFileSync, statSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { CONFIG_FILE, DATABASE_PATH, KEY_FIELDS, MIN_KEY_LENGTH } from "../config.js";
import { ConfigError, errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";

const configSchema = z.record(z.string(), z.unknown());

export interface SignalSource {
  dir: string;
  configFile: string;
  dbFile: string;
  key: string;
}

/**
 * Pick the key out of a parsed config.json, trying each known field in order.
 */
export function extractKey(config: Record<string, unknown>, logger: Logger = silentLogger): string {
  const field = KEY_FIELDS.find((name) => name in config);
  if (!field) {
    const available = Object.keys(config);
    throw new ConfigError("Could not find the encryption key in config.json", [
      `Available fields: ${available.length > 0 ? available.join(", ") : "(none)"}`,
      "Signal may have changed its config file format, or the installation is damaged",
      "Please report this issue with the available fields listed above",
    ]);
  }
  logger.info(`Found encryption key using field: '${field}'`);

  const key = config[field];
  if (typeof key !== "string") {
    throw new ConfigError(`Encryption key in field '${field}' is not a string`);
  }
  if (key.length < MIN_KEY_LENGTH) {
    throw new ConfigError(`Encryption key is unusually short (length: ${key.length})`, [
      "Signal Desktop stores a 64 character hex key",
      "Check that --source points at the right Signal directory",
    ]);
  }
  // the key ends up inside a PRAGMA, which cannot take bound parameters
  if (!/^[0-9a-fA-F]+$/.test(key)) {
    throw new ConfigError("Encryption key is not a hex string", [
      "Newer Signal versions keep the key encrypted in 'encryptedKey', which is not supported",
    ]);
  }
  return key;
}

/**
 * Validate a Signal directory and read its key.
 */
export function readSignalSource(dir: string, logger: Logger = silentLogger): SignalSource {
  const configFile = join(dir, CONFIG_FILE);
  const dbFile = join(dir, DATABASE_PATH);

  if (!existsSync(configFile) || !statSync(configFile).isFile()) {
    throw new ConfigError(`Signal config file not found: ${configFile}`, [
      "Ensure Signal Desktop is installed and has been run at least once",
      "Use --source to specify the correct Signal directory",
      "Check that the directory contains 'config.json' and 'sql/db.sqlite'",
    ]);
  }

  let raw: string;
  try {
    raw = readFileSync(configFile, "utf-8");
  } catch (err) {
    throw new ConfigError(`Could not read ${configFile}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse config file as JSON: ${errorMessage(err)}`, [
      `Config file: ${configFile}`,
      "The config.json file appears to be corrupted",
    ]);
  }

  const config = configSchema.safeParse(parsed);
  if (!config.success) {
    throw new ConfigError(`Config file is not a JSON object: ${configFile}`);
  }
  const key = extractKey(config.data, logger);

  if (!existsSync(dbFile) || !statSync(dbFile).isFile()) {
    throw new ConfigError(`Signal database not found: ${dbFile}`, [
      "Ensure Signal Desktop is installed and has been run at least once",
      "Use --source to specify the correct Signal directory",
      "Close Signal Desktop if it is currently running",
    ]);
  }

  return { dir, configFile, dbFile, key };
}
