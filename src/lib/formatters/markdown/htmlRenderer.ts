/**
 * HTML email renderer. Every element carries inline styles because most
 * mail clients ignore stylesheets. Text is emitted as-is: the caller has
 * already escaped or stripped user markup.
 */

import type { HeadingLevel, MarkdownRenderer } from "./types";

const ACTION_LINK_IMAGE_STYLE = "vertical-align: middle;";
const BLOCK_QUOTE_STYLE =
  "background: #F1F1F1; padding: 24px 24px 0.1px 24px; font-family: Helvetica, Arial, sans-serif; font-size: 16px; line-height: 25px;";
const HEADING_STYLES: Record<HeadingLevel, string> = {
  1: "Margin: 0 0 16px 0; padding: 0; font-size: 32px; line-height: 38px; font-weight: bold; color: #323A45;",
  2: "Margin: 0 0 14px 0; padding: 0; font-size: 24px; line-height: 26px; font-weight: bold; color: #323A45; font-family: Helvetica, Arial, sans-serif;",
  3: "Margin: 0 0 12px 0; padding: 0; font-size: 20px; line-height: 26px; font-weight: bold; color: #323A45; font-family: Helvetica, Arial, sans-serif;",
  4: "Margin: 0 0 10px 0; padding: 0; font-size: 18px; line-height: 26px; font-weight: bold; color: #323A45; font-family: Helvetica, Arial, sans-serif;",
  5: "Margin: 0 0 8px 0; padding: 0; font-size: 16px; line-height: 24px; font-weight: bold; color: #323A45; font-family: Helvetica, Arial, sans-serif;",
  6: "Margin: 0 0 6px 0; padding: 0; font-size: 14px; line-height: 22px; font-weight: bold; color: #323A45; font-family: Helvetica, Arial, sans-serif;",
};
export const LINK_STYLE = "word-wrap: break-word; color: #004795;";
const LIST_ITEM_STYLE =
  "Margin: 5px 0 5px; padding: 0 0 0 5px; font-size: 16px; line-height: 25px; color: #323A45;";
const ORDERED_LIST_STYLE =
  "Margin: 0 0 0 20px; padding: 0 0 20px 0; list-style-type: decimal; font-family: Helvetica, Arial, sans-serif;";
const UNORDERED_LIST_STYLE =
  "Margin: 0 0 0 20px; padding: 0 0 20px 0; list-style-type: disc; font-family: Helvetica, Arial, sans-serif;";
export const PARAGRAPH_STYLE = "Margin: 0 0 20px 0; font-size: 16px; line-height: 25px; color: #323A45;";
const THEMATIC_BREAK_STYLE = "border: 0; height: 1px; background: #BFC1C3; Margin: 30px 0 30px 0;";

const PLACEHOLDER_SPAN = /<span class='placeholder[^']*'>(?:<mark>)?([^<]*)(?:<\/mark>)?<\/span>/g;

/** Placeholder markup inside a URL collapses back to its ((name)) text. */
function href(url: string): string {
  return url.replace(PLACEHOLDER_SPAN, "$1").replace(/"/g, "%22").replace(/'/g, "%27");
}

function attribute(value: string): string {
  return value.replace(/"/g, "&quot;");
}

export type HtmlRendererOptions = {
  actionLinkImageUrl: string;
};

export function createHtmlRenderer({ actionLinkImageUrl }: HtmlRendererOptions): MarkdownRenderer {
  const anchor = (content: string, url: string, title: string | null = null) =>
    `<a style="${LINK_STYLE}" target="_blank" href="${href(url)}"${
      title ? ` title="${attribute(title)}"` : ""
    }>${content}</a>`;

  return {
    document: (blocks) => blocks.join("\n"),

    paragraph: (content) => (content.trim() ? `<p style="${PARAGRAPH_STYLE}">${content}</p>` : ""),
    heading: (content, level) => `<h${level} style="${HEADING_STYLES[level]}">${content}</h${level}>`,
    blockQuote: (blocks) => `<blockquote style="${BLOCK_QUOTE_STYLE}">${blocks.join("\n")}</blockquote>`,
    list: (items, ordered, start) => {
      const tag = ordered ? "ol" : "ul";
      const style = ordered ? ORDERED_LIST_STYLE : UNORDERED_LIST_STYLE;
      const startAttr = ordered && start !== 1 ? ` start="${start}"` : "";
      const body = items.map((item) => `<li style="${LIST_ITEM_STYLE}">${item}</li>`).join("");
      return `<${tag} role="presentation" style="${style}"${startAttr}>${body}</${tag}>`;
    },
    thematicBreak: () => `<hr style="${THEMATIC_BREAK_STYLE}" />`,
    code: (text) => (text.trim() ? `<p style="${PARAGRAPH_STYLE}">${text.replace(/\n/g, "<br />")}</p>` : ""),
    table: () => "",

    text: (text) => text,
    html: (html) => html,
    strong: (content) => `<strong>${content}</strong>`,
    emphasis: (content) => `<em>${content}</em>`,
    strikethrough: (content) => content,
    codespan: (text) => text,
    link: (content, url, title) => anchor(content, url, title),
    autolink: (url) => anchor(url, url),
    actionLink: (text, url) =>
      `<a href="${href(url)}"><img alt="call to action img" src="${actionLinkImageUrl}" style="${ACTION_LINK_IMAGE_STYLE}"> <b>${text}</b></a>`,
    image: () => "",
    lineBreak: () => "<br />",
  };
}
