import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import {
  BUNDLED_STYLESHEET,
  copyStylesheet,
  createHtml,
  renderConversationHtml,
  renderEntry,
} from "../../src/html/paginate.js";
import { pageNav } from "../../src/html/templates.js";
import type { TranscriptEntry } from "../../src/transcript/grammar.js";
import { makeTempDir } from "../helpers/signal-fixture.js";
import { spyLogger } from "../helpers/logger.js";

function entry(minute: number, sender = "Bob"): TranscriptEntry {
  return { date: `[2024-01-01 10:${String(minute).padStart(2, "0")}]`, sender: ` ${sender}:`, body: ` m${minute}  \n` };
}

let root: string;

beforeEach(() => {
  root = makeTempDir();
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("pageNav", () => {
  it("links to neighbouring pages only", () => {
    expect(pageNav(0, 2)).toBe("<nav><div class=prev>&nbsp;</div><div class=next><a href='#pg1'>NEXT</a></div></nav>");
    expect(pageNav(2, 2)).toBe("<nav><div class=prev><a href='#pg1'>PREV</a></div><div class=next>&nbsp;</div></nav>");
    expect(pageNav(0, 0)).toBe("<nav><div class=prev>&nbsp;</div><div class=next>&nbsp;</div></nav>");
  });
});

describe("renderEntry", () => {
  it("splits the header into spans", () => {
    const html = renderEntry(entry(5));
    expect(html.startsWith(
      "<div class='msg'><span class=date>2024-01-01</span><span class=time>10:05</span>" +
        "<span class=sender>Bob</span><span class=body>",
    )).toBe(true);
    expect(html).toContain("m5");
    expect(html.endsWith("</span></div>")).toBe(true);
  });

  it("marks own messages", () => {
    expect(renderEntry(entry(1, "Me")).startsWith("<div class='msg me'>")).toBe(true);
  });

  it("escapes sender names", () => {
    expect(renderEntry(entry(1, "<b>")).includes("<span class=sender>&lt;b&gt;</span>")).toBe(true);
  });

  it("accepts the comma date variant", () => {
    const html = renderEntry({ date: "[2024-01-01, 10:05]", sender: " Bob:", body: " x\n" });
    expect(html).toContain("<span class=date>2024-01-01</span><span class=time>10:05</span>");
  });
});

describe("renderConversationHtml", () => {
  it("splits entries into pages of the given size", () => {
    const html = renderConversationHtml("Bob", [1, 2, 3, 4, 5].map((m) => entry(m)), 2);
    expect(html.match(/<div class=page id=pg\d+>/g)).toEqual([
      "<div class=page id=pg0>",
      "<div class=page id=pg1>",
      "<div class=page id=pg2>",
    ]);
    expect(html).toContain(`<div class=page id=pg2>\n${pageNav(2, 2)}`);
    expect(html.match(/<div class='msg'>/g)).toHaveLength(5);
  });

  it("fits exactly full pages without an empty trailing page", () => {
    const html = renderConversationHtml("Bob", [1, 2, 3, 4].map((m) => entry(m)), 2);
    expect(html.match(/<div class=page id=pg\d+>/g)).toHaveLength(2);
    expect(html).toContain(`<div class=page id=pg1>\n${pageNav(1, 1)}`);
  });

  it("renders an empty conversation without pages", () => {
    const html = renderConversationHtml("Bob", [], 100);
    expect(html).not.toContain("<div class=page");
    expect(html).toContain("<title>Bob</title>");
  });

  it("rejects a non-positive page size", () => {
    expect(() => renderConversationHtml("Bob", [], 0)).toThrow(RangeError);
  });
});

describe("copyStylesheet", () => {
  it("ships a bundled stylesheet", () => {
    expect(existsSync(BUNDLED_STYLESHEET)).toBe(true);
  });

  it("warns when the stylesheet is missing", () => {
    const logger = spyLogger();
    expect(copyStylesheet(root, join(root, "none.css"), logger)).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith("HTML files will be created without styling.");
    expect(existsSync(join(root, "style.css"))).toBe(false);
  });
});

describe("createHtml", () => {
  it("writes index.html beside each transcript", () => {
    const dest = join(root, "out");
    mkdirSync(join(dest, "Bob"), { recursive: true });
    mkdirSync(join(dest, "Empty"));
    writeFileSync(join(dest, "Bob", "index.md"), "[2024-01-01 10:00] Bob: hi  \n[2024-01-01 10:01] Me: yo  \n");
    const css = join(root, "custom.css");
    writeFileSync(css, "body { margin: 0 }");

    const rendered = createHtml(dest, { perPage: 1, stylesheet: css });

    expect(rendered).toEqual(["Bob", "Empty"]);
    expect(readFileSync(join(dest, "style.css"), "utf-8")).toBe("body { margin: 0 }");
    expect(readFileSync(join(dest, "Empty", "index.md"), "utf-8")).toBe("");
    const html = readFileSync(join(dest, "Bob", "index.html"), "utf-8");
    expect(html.match(/<div class=page id=pg\d+>/g)).toHaveLength(2);
    expect(html).toContain("<div class='msg me'>");
    expect(existsSync(join(dest, "Empty", "index.html"))).toBe(true);
  });
});
