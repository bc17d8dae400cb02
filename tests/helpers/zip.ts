import { createWriteStream, readFileSync, writeFileSync } from "fs";
import { pipeline } from "stream/promises";
import * as yazl from "yazl";

/**
 * Write a ZIP archive. Names ending in "/" become directory entries.
 */
export async function writeZip(path: string, files: Record<string, string>): Promise<void> {
  const zip = new yazl.ZipFile();
  for (const [name, content] of Object.entries(files)) {
    if (name.endsWith("/")) {
      zip.addEmptyDirectory(name);
    } else {
      zip.addBuffer(Buffer.from(content, "utf-8"), name);
    }
  }
  zip.end();
  await pipeline(zip.outputStream, createWriteStream(path));
}

/**
 * Replace `from` with `to` in every stored entry name. yazl refuses names
 * such as "../x", so hostile archives are written with a same-length
 * placeholder and patched.
 */
export function renameEntries(path: string, from: string, to: string): void {
  if (from.length !== to.length) throw new Error("names must keep their length");
  const bytes = readFileSync(path);
  const needle = Buffer.from(from, "utf-8");
  for (let i = bytes.indexOf(needle); i !== -1; i = bytes.indexOf(needle, i + needle.length)) {
    bytes.write(to, i, "utf-8");
  }
  writeFileSync(path, bytes);
}
