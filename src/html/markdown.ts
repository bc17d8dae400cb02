/**
 * Markdown to HTML for transcript bodies, plus the media post-processing
 * applied to the rendered markup.
 */

import MarkdownIt from "markdown-it";
import { parse } from "node-html-parser";
import { audio, figure, video } from "./templates.js";

// linkify turns bare URLs in message text into anchors
const md = new MarkdownIt({ html: false, linkify: true });

/**
 * Replace images with lightbox figures and voice-note/video links with
 * players; external links open in a new tab.
 */
export function enrichMedia(html: string): string {
  const root = parse(html);

  for (const img of root.querySelectorAll("img")) {
    const src = img.getAttribute("src");
    if (!src) continue;
    img.replaceWith(figure(src, img.getAttribute("alt") ?? src));
  }

  for (const link of root.querySelectorAll("a")) {
    const href = link.getAttribute("href");
    if (!href) continue;
    const path = href.toLowerCase().split(/[?#]/)[0];
    if (path.endsWith(".m4a")) {
      link.replaceWith(audio(href));
    } else if (path.endsWith(".mp4")) {
      link.replaceWith(video(href));
    } else if (/^https?:\/\//i.test(href)) {
      link.setAttribute("target", "_blank");
    }
  }

  return root.toString();
}

export function renderBody(body: string): string {
  return enrichMedia(md.render(body));
}
