import { describe, it, expect, afterEach } from "vitest";
import { chmodSync, existsSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { ExternalToolDecryption, buildExportScript, installHint } from "../../src/decrypt/external.js";
import { DecryptionError, ToolMissingError } from "../../src/errors.js";
import { TEST_KEY, createSignalDb, makeTempDir } from "../helpers/signal-fixture.js";

let dirs: string[] = [];

afterEach(() => {
  for (const dir of dirs) rmSync(dir, { recursive: true, force: true });
  dirs = [];
});

function tempDir(): string {
  const dir = makeTempDir();
  dirs.push(dir);
  return dir;
}

/** Shell script standing in for the sqlcipher binary. */
function fakeTool(dir: string, body: string): string {
  const file = join(dir, "fake-sqlcipher");
  writeFileSync(file, `#!/bin/sh\n${body}\n`);
  chmodSync(file, 0o755);
  return file;
}

describe("buildExportScript", () => {
  it("keys, configures and exports into the target", () => {
    expect(buildExportScript("abcd", "/data/db-decrypt.sqlite")).toBe(
      [
        `PRAGMA key = "x'abcd'";`,
        "PRAGMA cipher_page_size = 4096;",
        "PRAGMA kdf_iter = 64000;",
        "PRAGMA cipher_hmac_algorithm = HMAC_SHA512;",
        "PRAGMA cipher_kdf_algorithm = PBKDF2_HMAC_SHA512;",
        "ATTACH DATABASE '/data/db-decrypt.sqlite' AS plaintext KEY '';",
        "SELECT sqlcipher_export('plaintext');",
        "DETACH DATABASE plaintext;",
        "",
      ].join("\n"),
    );
  });

  it("doubles quotes in the target path", () => {
    expect(buildExportScript("abcd", "/home/o'neil/x.sqlite")).toContain(
      "ATTACH DATABASE '/home/o''neil/x.sqlite' AS plaintext KEY '';",
    );
  });
});

describe("installHint", () => {
  it("names the package manager per platform", () => {
    expect(installHint("darwin")).toBe("macOS: brew install sqlcipher");
    expect(installHint("aix")).toBe("Install the sqlcipher command-line tool and make sure it is on PATH");
  });
});

describe("ExternalToolDecryption", () => {
  it("raises ToolMissingError when the binary cannot be started", () => {
    const dir = tempDir();
    const strategy = new ExternalToolDecryption({ binary: join(dir, "no-such-tool") });
    expect(strategy.isAvailable()).toBe(false);
    expect(() => strategy.open(join(dir, "db.sqlite"), TEST_KEY)).toThrow(ToolMissingError);
  });

  it("raises DecryptionError on a non-zero exit and leaves no sibling", () => {
    const dir = tempDir();
    const tool = fakeTool(dir, 'cat > /dev/null\necho "file is not a database" >&2\nexit 3');
    const strategy = new ExternalToolDecryption({ binary: tool });

    let error: unknown;
    try {
      strategy.open(join(dir, "db.sqlite"), TEST_KEY);
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(DecryptionError);
    expect(error).not.toBeInstanceOf(ToolMissingError);
    expect(error instanceof Error ? error.message : "").toBe(
      "Manual decryption failed (exit code 3): file is not a database",
    );
    expect(existsSync(join(dir, "db-decrypt.sqlite"))).toBe(false);
  });

  it("raises DecryptionError when the tool writes nothing", () => {
    const dir = tempDir();
    const tool = fakeTool(dir, "cat > /dev/null");
    const strategy = new ExternalToolDecryption({ binary: tool });
    expect(() => strategy.open(join(dir, "db.sqlite"), TEST_KEY)).toThrow("Manual decryption failed (exit code 0)");
  });

  it("opens the exported copy and removes it on close", () => {
    const dir = tempDir();
    const plaintext = join(dir, "fixture.sqlite");
    createSignalDb(plaintext, [{ id: "p1", type: "private", name: "Bob" }], []);
    const tool = fakeTool(dir, `cat > /dev/null\ncp '${plaintext}' "$(dirname "$1")/db-decrypt.sqlite"`);

    const store = new ExternalToolDecryption({ binary: tool }).open(join(dir, "db.sqlite"), TEST_KEY);
    const sibling = join(dir, "db-decrypt.sqlite");
    try {
      expect(store.strategy).toBe("external");
      expect(existsSync(sibling)).toBe(true);
      expect(store.db.prepare("SELECT name FROM conversations").pluck().get()).toBe("Bob");
    } finally {
      store.close();
    }
    expect(existsSync(sibling)).toBe(false);
  });

  it("pipes the export script to the tool", () => {
    const dir = tempDir();
    const plaintext = join(dir, "fixture.sqlite");
    createSignalDb(plaintext, [], []);
    const script = join(dir, "received.sql");
    const tool = fakeTool(dir, `cat > '${script}'\ncp '${plaintext}' "$(dirname "$1")/db-decrypt.sqlite"`);

    new ExternalToolDecryption({ binary: tool }).open(join(dir, "db.sqlite"), TEST_KEY).close();
    expect(readFileSync(script, "utf-8")).toBe(buildExportScript(TEST_KEY, join(dir, "db-decrypt.sqlite")));
  });

  it("replaces a stale sibling left by an earlier run", () => {
    const dir = tempDir();
    writeFileSync(join(dir, "db-decrypt.sqlite"), "stale");
    const tool = fakeTool(dir, "cat > /dev/null");
    expect(() => new ExternalToolDecryption({ binary: tool }).open(join(dir, "db.sqlite"), TEST_KEY)).toThrow(
      DecryptionError,
    );
    expect(existsSync(join(dir, "db-decrypt.sqlite"))).toBe(false);
  });
});
