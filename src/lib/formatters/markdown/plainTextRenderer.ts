import type { MarkdownRenderer } from "./types";

export const COLUMN_WIDTH = 65;

/** Plain-text email bodies: readable in any client, links spelled out. */
export const plainTextRenderer: MarkdownRenderer = {
  document: (blocks) => blocks.join("\n\n"),

  paragraph: (content) => content,
  heading: (content, level) =>
    `${level === 1 ? "\n" : ""}${content}\n${"-".repeat(COLUMN_WIDTH)}`,
  blockQuote: (blocks) => blocks.join("\n\n"),
  list: (items, ordered, start) =>
    items
      .map((item, i) => `${ordered ? `${start + i}.` : "•"} ${item.replace(/\n/g, "\n  ")}`)
      .join("\n"),
  thematicBreak: () => "=".repeat(COLUMN_WIDTH),
  code: (text) => text,
  table: () => "",

  text: (text) => text,
  html: (html) => html,
  strong: (content) => `**${content}**`,
  emphasis: (content) => `_${content}_`,
  strikethrough: (content) => content,
  codespan: (text) => text,
  link: (content, url, title) => (title ? `${content} (${title}): ${url}` : `${content}: ${url}`),
  autolink: (url) => url,
  actionLink: (text, url) => `${text}: ${url}`,
  image: () => "",
  lineBreak: () => "\n",
};

/**
 * Inbox preview text: words only. Headings, links and emphasis lose their
 * markup; unordered list items keep a literal bullet.
 */
export const preheaderRenderer: MarkdownRenderer = {
  document: (blocks) => blocks.join(" "),

  paragraph: (content) => content,
  heading: (content) => content,
  blockQuote: (blocks) => blocks.join(" "),
  list: (items, ordered, start) =>
    items.map((item, i) => `${ordered ? `${start + i}.` : "•"} ${item}`).join(" "),
  thematicBreak: () => "",
  code: (text) => text,
  table: () => "",

  text: (text) => text,
  html: (html) => html,
  strong: (content) => content,
  emphasis: (content) => content,
  strikethrough: (content) => content,
  codespan: (text) => text,
  link: (content) => content,
  autolink: (url) => url,
  actionLink: (text) => text,
  image: () => "",
  lineBreak: () => " ",
};
