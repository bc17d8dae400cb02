/**
 * Fatal error types. Each carries remediation hints printed by the CLI.
 * Per-record problems (a broken attachment, a message without a sender)
 * are logged where they happen and never raised.
 */

export class ArchiveError extends Error {
  hints: string[];

  constructor(message: string, hints: string[] = []) {
    super(message);
    this.name = new.target.name;
    this.hints = hints;
  }
}

/** config.json missing or unusable, database file missing, unknown platform. */
export class ConfigError extends ArchiveError {}

/** The store could not be decrypted by the selected strategy. */
export class DecryptionError extends ArchiveError {}

/** The external decryption tool is not on PATH. */
export class ToolMissingError extends DecryptionError {}

export class QueryError extends ArchiveError {}

export class DestinationError extends ArchiveError {}

export class MergeError extends ArchiveError {}

/**
 * Render an unknown thrown value as a single line of text.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
