/**
 * Export command: decrypt → load → copy attachments → transcripts
 * → optional merge → HTML.
 */

import { existsSync, mkdirSync, rmSync } from "fs";
import { homedir } from "os";
import { resolve } from "path";
import { DEFAULT_MESSAGES_PER_PAGE, resolveSourceDir } from "../config.js";
import { withStore } from "../decrypt/gateway.js";
import type { DecryptionMode, DecryptionStrategy } from "../decrypt/types.js";
import { ExternalToolDecryption } from "../decrypt/external.js";
import { DestinationError } from "../errors.js";
import { loadConversations } from "../db/loader.js";
import { copyAttachments, planAttachments } from "../export/attachments.js";
import { assignDirectories, sanitizeContacts } from "../export/directories.js";
import { renderTranscripts } from "../export/transcript.js";
import { createHtml } from "../html/paginate.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import { withOldExport } from "../merge/archive.js";
import { mergeExports } from "../merge/merge.js";
import type { ExportMergeResult } from "../merge/merge.js";
import type { LoadResult } from "../model/types.js";
import { readSignalSource } from "../source/signal-dir.js";

export interface SourceOptions {
  /** Signal directory; the platform default when omitted. */
  source?: string;
  chats?: string[];
  mode?: DecryptionMode;
  sqlcipher?: string;
  /** Strategy overrides, used by tests. */
  direct?: DecryptionStrategy;
  external?: DecryptionStrategy;
  logger?: Logger;
}

export interface ExportOptions extends SourceOptions {
  dest: string;
  old?: string;
  overwrite?: boolean;
  perPage?: number;
  stylesheet?: string;
}

export interface ExportSummary {
  dest: string;
  conversations: number;
  messages: number;
  attachmentsCopied: number;
  attachmentsMissing: number;
  merge?: ExportMergeResult;
  html: string[];
}

export function expandHome(path: string): string {
  return path.replace(/^~(?=$|[/\\])/, homedir());
}

/**
 * Read the key, decrypt, and load contacts and conversations. The store
 * is closed (and any plaintext copy removed) before this returns.
 */
export function loadFromSignal(options: SourceOptions): LoadResult & { sourceDir: string } {
  const logger = options.logger ?? silentLogger;
  const sourceDir = options.source
    ? expandHome(options.source)
    : resolveSourceDir(process.platform, homedir());

  const source = readSignalSource(sourceDir, logger);
  logger.info(`Signal directory: ${source.dir}`);
  logger.info(`Database: ${source.dbFile}`);
  logger.step(`Fetching data from ${source.dbFile}`);

  const result = withStore(
    {
      dbFile: source.dbFile,
      key: source.key,
      mode: options.mode,
      direct: options.direct,
      external: options.external ?? new ExternalToolDecryption({ binary: options.sqlcipher, logger }),
      logger,
    },
    (store) => loadConversations(store.db, { chats: options.chats, logger }),
  );
  return { ...result, sourceDir };
}

/**
 * Create the destination, or replace it when overwrite is set.
 */
export function prepareDestination(dest: string, overwrite: boolean, logger: Logger = silentLogger): void {
  if (!existsSync(dest)) {
    mkdirSync(dest, { recursive: true });
    return;
  }
  if (!overwrite) {
    throw new DestinationError(`Output directory already exists: ${dest}`, [
      "Use --overwrite to replace the existing export",
      "Use --old to merge a previous export into a new one",
      "Specify a different output directory",
    ]);
  }
  logger.warn(`Overwriting existing directory: ${dest}`);
  rmSync(dest, { recursive: true, force: true });
  mkdirSync(dest, { recursive: true });
}

export async function runExport(options: ExportOptions): Promise<ExportSummary> {
  const logger = options.logger ?? silentLogger;
  const dest = resolve(expandHome(options.dest));
  logger.info(`Output: ${dest}`);

  const { contacts: loaded, conversations, sourceDir } = loadFromSignal(options);

  prepareDestination(dest, options.overwrite ?? false, logger);

  const contacts = sanitizeContacts(loaded);
  const directories = assignDirectories(contacts, logger);
  const plan = planAttachments(conversations, contacts, logger);

  logger.step("Copying and renaming attachments");
  const copied = copyAttachments({ sourceDir, dest, conversations, directories, plan, logger });

  logger.step("Creating markdown files");
  const messages = renderTranscripts({ dest, contacts, conversations, directories, plan, logger });

  let merge: ExportMergeResult | undefined;
  if (options.old) {
    const old = resolve(expandHome(options.old));
    logger.step(`Merging old at ${old} into output directory`);
    logger.step("No existing files will be deleted or overwritten!");
    merge = await withOldExport(old, (dir) => mergeExports(dest, dir, logger), logger);
  }

  logger.step("Creating HTML files");
  const html = createHtml(dest, {
    perPage: options.perPage ?? DEFAULT_MESSAGES_PER_PAGE,
    stylesheet: options.stylesheet,
    logger,
  });

  logger.step(`Done! Files exported to ${dest}.`);
  return {
    dest,
    conversations: conversations.size,
    messages,
    attachmentsCopied: copied.copied,
    attachmentsMissing: copied.missing,
    merge,
    html,
  };
}
