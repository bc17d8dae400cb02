#!/usr/bin/env node
/**
 * CLI entry point for signal-archive.
 */

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { DEFAULT_DEST, DEFAULT_MESSAGES_PER_PAGE, DEFAULT_SQLCIPHER_BIN } from "./config.js";
import { ArchiveError } from "./errors.js";
import { createLogger } from "./log.js";

interface CliOptions {
  source?: string;
  chats?: string;
  listChats: boolean;
  old?: string;
  overwrite: boolean;
  verbose: boolean;
  manual: boolean;
  perPage: number;
  sqlcipher: string;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

function splitChats(value: string | undefined): string[] | undefined {
  return value === undefined ? undefined : value.split(",");
}

const program = new Command();

program
  .name("signal-archive")
  .description(
    "Read the Signal Desktop directory and write attachments, Markdown and HTML transcripts to DEST.\n\n" +
      "Default Signal directories:\n" +
      "  Linux:   ~/.config/Signal\n" +
      "  macOS:   ~/Library/Application Support/Signal\n" +
      "  Windows: ~/AppData/Roaming/Signal",
  )
  .version("0.1.0")
  .argument("[dest]", "Output directory", DEFAULT_DEST)
  .option("-s, --source <path>", "Path to the Signal directory (config.json and sql/db.sqlite)")
  .option("-c, --chats <names>", "Comma-separated contact or group names to include")
  .option("--list-chats", "List all available chats and quit", false)
  .option("--old <path>", "Previous export (directory or .zip) to merge into the new one")
  .option("-o, --overwrite", "Overwrite an existing output directory", false)
  .option("-v, --verbose", "Enable verbose output logging", false)
  .option("-m, --manual", "Decrypt with the sqlcipher CLI instead of in-process", false)
  .option("--per-page <n>", "Messages per HTML page", parsePositiveInt, DEFAULT_MESSAGES_PER_PAGE)
  .option("--sqlcipher <bin>", "sqlcipher executable used for manual decryption", DEFAULT_SQLCIPHER_BIN)
  .action(async (dest: string, opts: CliOptions) => {
    const logger = createLogger({ verbose: opts.verbose });
    logger.info("Verbose logging enabled");

    const source = {
      source: opts.source,
      chats: splitChats(opts.chats),
      mode: opts.manual ? ("external" as const) : ("auto" as const),
      sqlcipher: opts.sqlcipher,
      logger,
    };

    try {
      if (opts.listChats) {
        const { runListChats } = await import("./cli/list.js");
        runListChats(source);
        return;
      }

      logger.step(chalk.bold("Signal Archive"));
      logger.step("=".repeat(50));
      const { runExport } = await import("./cli/export.js");
      await runExport({
        ...source,
        dest,
        old: opts.old,
        overwrite: opts.overwrite,
        perPage: opts.perPage,
      });
    } catch (err) {
      if (!(err instanceof ArchiveError)) throw err;
      logger.error(`Error: ${err.message}`);
      for (const hint of err.hints) {
        logger.error(`  - ${hint}`);
      }
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? (err.stack ?? err.message) : String(err)));
  process.exitCode = 1;
});
