/**
 * HTML snippets for the paginated conversation pages.
 */

import MarkdownIt from "markdown-it";

const { escapeHtml } = new MarkdownIt().utils;

export { escapeHtml };

export const EMOJI_SCRIPT = "https://cdn.jsdelivr.net/npm/twemoji@14.0.2/dist/twemoji.min.js?11.2";

export function pageHead(title: string): string {
  return [
    "<!doctype html>",
    "<html lang='en'><head>",
    "<meta charset='utf-8'>",
    `<title>${escapeHtml(title)}</title>`,
    "<link rel=stylesheet href='../style.css'>",
    "<style>img.emoji { height: 1em; width: 1em; margin: 0 .05em 0 .1em; vertical-align: -0.1em; }</style>",
    `<script src='${EMOJI_SCRIPT}'></script>`,
    "<script>window.onload = function () { twemoji.parse(document.body); }</script>",
    "</head>",
    "<body>",
  ].join("\n");
}

export function pageFoot(): string {
  return [
    "<script>if (!document.location.hash) { document.location.hash = 'pg0'; }</script>",
    "</body></html>",
    "",
  ].join("\n");
}

/**
 * Previous/next links for page `page` of `lastPage` (both zero-based).
 */
export function pageNav(page: number, lastPage: number): string {
  const prev = page > 0 ? `<a href='#pg${page - 1}'>PREV</a>` : "&nbsp;";
  const next = page < lastPage ? `<a href='#pg${page + 1}'>NEXT</a>` : "&nbsp;";
  return `<nav><div class=prev>${prev}</div><div class=next>${next}</div></nav>`;
}

export function figure(src: string, alt: string): string {
  const s = escapeHtml(src);
  const a = escapeHtml(alt);
  return [
    "<figure>",
    `<label for="${a}"><img load="lazy" src="${s}" alt="${a}"></label>`,
    `<input class="modal-state" id="${a}" type="checkbox">`,
    `<div class="modal"><label for="${a}"><div class="modal-content">`,
    `<img class="modal-photo" loading="lazy" src="${s}" alt="${a}">`,
    "</div></label></div>",
    "</figure>",
  ].join("");
}

export function audio(src: string): string {
  return `<audio controls><source src="${escapeHtml(src)}" type="audio/mp4"></audio>`;
}

export function video(src: string): string {
  return `<video controls><source src="${escapeHtml(src)}" type="video/mp4"></video>`;
}
