import { describe, it, expect } from "vitest";
import {
  assignDirectories,
  listChatNames,
  sanitizeContacts,
  sanitizeName,
} from "../../src/export/directories.js";
import type { Contact, ContactMap } from "../../src/model/types.js";
import { spyLogger } from "../helpers/logger.js";

function contact(id: string, name: string | null, number: string | null = null): Contact {
  return { id, name, number, profileName: null, isGroup: false };
}

function contactMap(...contacts: Contact[]): ContactMap {
  return new Map(contacts.map((c) => [c.id, c]));
}

describe("sanitizeName", () => {
  it("keeps only letters and digits", () => {
    expect(sanitizeName("Ann-Marie O'Neil 2")).toBe("AnnMarieONeil2");
  });

  it("keeps letters from other scripts", () => {
    expect(sanitizeName("Zoë & Jürgen")).toBe("ZoëJürgen");
  });

  it("drops emoji and punctuation", () => {
    expect(sanitizeName("🎉 Party! 🎉")).toBe("Party");
  });
});

describe("sanitizeContacts", () => {
  it("falls back to the number, then to None", () => {
    const result = sanitizeContacts(
      contactMap(contact("a", "Alice Smith"), contact("b", null, "+15550100"), contact("c", null), contact("d", "!!!")),
    );
    expect(result.get("a")?.name).toBe("AliceSmith");
    expect(result.get("b")?.name).toBe("15550100");
    expect(result.get("c")?.name).toBe("None");
    expect(result.get("d")?.name).toBe("None");
  });

  it("does not mutate the loaded contacts", () => {
    const original = contactMap(contact("a", "Alice Smith"));
    sanitizeContacts(original);
    expect(original.get("a")?.name).toBe("Alice Smith");
  });
});

describe("assignDirectories", () => {
  it("suffixes colliding names in map order", () => {
    const logger = spyLogger();
    const index = assignDirectories(
      contactMap(contact("a", "Sam"), contact("b", "Sam"), contact("c", "Alex"), contact("d", "Sam")),
      logger,
    );
    expect(index.get("a")).toBe("Sam");
    expect(index.get("b")).toBe("Sam_2");
    expect(index.get("c")).toBe("Alex");
    expect(index.get("d")).toBe("Sam_3");
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("treats names differing only in case as colliding", () => {
    const index = assignDirectories(contactMap(contact("a", "Ann"), contact("b", "ann")));
    expect(index.get("b")).toBe("ann_2");
  });
});

describe("listChatNames", () => {
  it("returns sorted non-null names", () => {
    const names = listChatNames(contactMap(contact("a", "Zed"), contact("b", null), contact("c", "Amy")));
    expect(names).toEqual(["Amy", "Zed"]);
  });
});
