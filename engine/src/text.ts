/**
 * pkgdex Engine — Text Helpers
 *
 * Pure string helpers shared by the document formatters.
 */

import { sortVersionsDescending } from "@pkgdex/catalog";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
};

/**
 * Escape text for insertion into HTML content or a quoted attribute.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** "build" → "Build" */
export function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Greedy word wrap. Words longer than `width` get a line of their own.
 */
export function wrapWords(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = "";
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (line && line.length + 1 + word.length > width) {
      lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines;
}

/**
 * Reflow a description for a document body: paragraphs (separated by
 * blank lines) are wrapped to `width` and indented by `indent` spaces,
 * with one blank line between paragraphs.
 *
 * An empty description yields an empty string.
 */
export function formatDescription(text: string, indent = 0, width = 72): string {
  const pad = " ".repeat(indent);
  return text
    .split(/\n\s*\n/)
    .map((paragraph) => wrapWords(paragraph, width).map((l) => pad + l))
    .filter((lines) => lines.length > 0)
    .map((lines) => lines.join("\n"))
    .join("\n\n");
}

/**
 * Versions newest first, comma separated.
 */
export function describeVersions(versions: Iterable<string>): string {
  return sortVersionsDescending(versions).join(", ");
}

const URL_UNSAFE: Record<string, string> = {
  " ": "%20",
  '"': "%22",
  "<": "%3C",
  ">": "%3E",
};

/**
 * Percent-encode the characters that cannot appear in a quoted href or
 * id attribute. Everything else is left as written.
 */
export function quoteUrl(url: string): string {
  return url.replace(/[ "<>]/g, (ch) => URL_UNSAFE[ch] ?? ch);
}
