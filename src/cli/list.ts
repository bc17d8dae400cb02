/**
 * List command: print the available chat names and stop.
 */

import { listChatNames } from "../export/directories.js";
import type { SourceOptions } from "./export.js";
import { loadFromSignal } from "./export.js";

export function runListChats(options: SourceOptions): string[] {
  const { contacts } = loadFromSignal(options);
  const names = listChatNames(contacts);
  if (names.length === 0) {
    console.log("No chats found.");
  } else {
    console.log(names.join("\n"));
  }
  return names;
}
