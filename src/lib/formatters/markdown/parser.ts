/**
 * Markdown subset parser
 *
 * Line-oriented block pass followed by a single-scan inline pass. The grammar
 * covers what message authors write, plus the platform's own extensions
 * (`^` block quotes, `•` bullets, `>>[text](url)` action links).
 */

import type { Block, HeadingLevel, Inline } from "./types";

// ---------------------------------------------------------------------------
// Block grammar
// ---------------------------------------------------------------------------

const BLANK = /^\s*$/;
const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})/;
const QUOTE = /^\s*\^|^ {0,3}>(?!>)/;
const QUOTE_MARKER = /^\s*\^[ \t]?|^ {0,3}>[ \t]?/;
const HEADING = /^ {0,3}(#{1,6})(?=[^#]|$)[ \t]*(.*?)(?:[ \t]+#+)?[ \t]*$/;
const THEMATIC_BREAK = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;
const BULLET_ITEM = /^ {0,3}(?:[*+-][ \t]+|[*+-]$|•[ \t]*)(.*)$/;
const ORDERED_ITEM = /^ {0,3}(\d{1,9})\.(?!\d)[ \t]*(.*)$/;
const TABLE_SEPARATOR = /^ {0,3}\|?[ \t]*:?-+:?[ \t]*(?:\|[ \t]*:?-+:?[ \t]*)+\|?[ \t]*$/;

function matchListItem(line: string, ordered: boolean): string | null {
  if (THEMATIC_BREAK.test(line)) return null;
  if (ordered) {
    const m = ORDERED_ITEM.exec(line);
    return m ? m[2] : null;
  }
  const m = BULLET_ITEM.exec(line);
  return m ? m[1] : null;
}

function startsBlock(line: string): boolean {
  return (
    FENCE_OPEN.test(line) ||
    QUOTE.test(line) ||
    HEADING.test(line) ||
    THEMATIC_BREAK.test(line) ||
    matchListItem(line, false) !== null ||
    matchListItem(line, true) !== null
  );
}

function isTableStart(lines: readonly string[], i: number): boolean {
  return lines[i].includes("|") && i + 1 < lines.length && TABLE_SEPARATOR.test(lines[i + 1]);
}

function headingLevel(marks: string): HeadingLevel {
  switch (marks.length) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    case 5:
      return 5;
    default:
      return 6;
  }
}

function parseBlocks(lines: readonly string[]): Block[] {
  const blocks: Block[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];

    if (BLANK.test(line)) {
      i++;
      continue;
    }

    const fence = FENCE_OPEN.exec(line);
    if (fence) {
      const marker = fence[1];
      const closing = new RegExp(`^ {0,3}${marker[0] === "`" ? "`" : "~"}{${marker.length},}\\s*$`);
      const body: string[] = [];
      i++;
      while (i < lines.length && !closing.test(lines[i])) body.push(lines[i++]);
      i++; // closing fence, or past the end
      blocks.push({ type: "code", text: body.join("\n") });
      continue;
    }

    if (QUOTE.test(line)) {
      const inner: string[] = [];
      while (i < lines.length && QUOTE.test(lines[i])) {
        inner.push(lines[i].replace(QUOTE_MARKER, ""));
        i++;
      }
      blocks.push({ type: "blockQuote", children: parseBlocks(inner) });
      continue;
    }

    const heading = HEADING.exec(line);
    if (heading) {
      blocks.push({
        type: "heading",
        level: headingLevel(heading[1]),
        children: parseInlines(heading[2]),
      });
      i++;
      continue;
    }

    if (THEMATIC_BREAK.test(line)) {
      blocks.push({ type: "thematicBreak" });
      i++;
      continue;
    }

    const ordered = matchListItem(line, false) === null && matchListItem(line, true) !== null;
    if (matchListItem(line, ordered) !== null) {
      const start = ordered ? Number(ORDERED_ITEM.exec(line)?.[1] ?? "1") : 1;
      const items: string[][] = [];

      while (i < lines.length) {
        const current = lines[i];
        const content = matchListItem(current, ordered);
        if (content !== null) {
          items.push([content.trim()]);
          i++;
          continue;
        }
        if (BLANK.test(current)) {
          let next = i;
          while (next < lines.length && BLANK.test(lines[next])) next++;
          if (next < lines.length && matchListItem(lines[next], ordered) !== null) {
            i = next;
            continue;
          }
          break;
        }
        if (startsBlock(current)) break;
        items[items.length - 1].push(current.trim());
        i++;
      }

      blocks.push({
        type: "list",
        ordered,
        start,
        items: items.map((itemLines) => parseInlines(itemLines.join("\n"))),
      });
      continue;
    }

    if (isTableStart(lines, i)) {
      const rows: string[] = [];
      while (i < lines.length && !BLANK.test(lines[i]) && lines[i].includes("|")) {
        rows.push(lines[i++]);
      }
      blocks.push({ type: "table", rows });
      continue;
    }

    const paragraph: string[] = [line.trim()];
    i++;
    while (
      i < lines.length &&
      !BLANK.test(lines[i]) &&
      !startsBlock(lines[i]) &&
      !isTableStart(lines, i)
    ) {
      paragraph.push(lines[i].trim());
      i++;
    }
    blocks.push({ type: "paragraph", children: parseInlines(paragraph.join("\n")) });
  }

  return blocks;
}

export function parseMarkdown(source: string): Block[] {
  return parseBlocks(source.replace(/\r\n?/g, "\n").split("\n"));
}

// ---------------------------------------------------------------------------
// Inline grammar
// ---------------------------------------------------------------------------

const HTML_TAG = /<!--[\s\S]*?-->|<\/?[A-Za-z][A-Za-z0-9-]*(?:\s[^<>]*)?\/?>/y;
const ACTION_LINK = /(?:>|&gt;){2}\[([\p{L}\p{N}_ -]+)\]\((\S+)\)/uy;
const AUTOLINK = /https?:\/\/[^\s<]+[^<.,:;"')\]\s]/y;
const ASCII_PUNCTUATION = /[!-/:-@[-`{-~]/;
const WORD_CHAR = /[\p{L}\p{N}_]/u;
const PLACEHOLDER_SPAN_START = "<span class='placeholder";

function isWordChar(c: string | undefined): boolean {
  return c !== undefined && WORD_CHAR.test(c);
}

function isSpace(c: string | undefined): boolean {
  return c === undefined || /\s/.test(c);
}

type LinkParts = {
  text: string;
  url: string;
  title: string | null;
  end: number;
};

/** Parse `[text](url "title")` starting at the `[`. */
function parseLinkAt(source: string, open: number): LinkParts | null {
  let depth = 0;
  let close = -1;
  for (let k = open; k < source.length; k++) {
    const c = source[k];
    if (c === "\\") {
      k++;
      continue;
    }
    if (c === "[") depth++;
    if (c === "]") {
      depth--;
      if (depth === 0) {
        close = k;
        break;
      }
    }
  }
  if (close === -1 || source[close + 1] !== "(") return null;

  let k = close + 2;
  while (source[k] === " ") k++;

  let url: string;
  if (source[k] === "<") {
    const end = source.indexOf(">", k);
    if (end === -1) return null;
    url = source.slice(k + 1, end);
    k = end + 1;
  } else {
    const from = k;
    let parens = 0;
    while (k < source.length) {
      if (source.startsWith(PLACEHOLDER_SPAN_START, k)) {
        const spanEnd = source.indexOf("</span>", k);
        if (spanEnd === -1) return null;
        k = spanEnd + "</span>".length;
        continue;
      }
      const c = source[k];
      if (isSpace(c)) break;
      if (c === "(") parens++;
      if (c === ")") {
        if (parens === 0) break;
        parens--;
      }
      k++;
    }
    url = source.slice(from, k);
  }

  while (source[k] === " ") k++;
  let title: string | null = null;
  const quote = source[k];
  if (quote === '"' || quote === "'") {
    const end = source.indexOf(quote, k + 1);
    if (end === -1) return null;
    title = source.slice(k + 1, end);
    k = end + 1;
    while (source[k] === " ") k++;
  }
  if (source[k] !== ")") return null;

  return { text: source.slice(open + 1, close), url, title, end: k + 1 };
}

/** Index of a closing delimiter that can end a span opened at `from`. */
function findClosing(source: string, delimiter: string, from: number): number {
  let j = source.indexOf(delimiter, from);
  while (j !== -1) {
    const before = source[j - 1];
    const after = source[j + delimiter.length];
    const wordBound = delimiter[0] !== "_" || !isWordChar(after);
    const notDoubled = delimiter.length > 1 || after !== delimiter;
    if (j > from && !isSpace(before) && wordBound && notDoubled) return j;
    j = source.indexOf(delimiter, j + delimiter.length);
  }
  return -1;
}

export function parseInlines(source: string): Inline[] {
  const out: Inline[] = [];
  let text = "";
  const flush = () => {
    if (text) out.push({ type: "text", text });
    text = "";
  };
  const push = (node: Inline) => {
    flush();
    out.push(node);
  };

  let i = 0;
  while (i < source.length) {
    const c = source[i];

    if (c === "\\" && ASCII_PUNCTUATION.test(source[i + 1] ?? "")) {
      text += source[i + 1];
      i += 2;
      continue;
    }

    ACTION_LINK.lastIndex = i;
    const action = ACTION_LINK.exec(source);
    if (action) {
      push({ type: "actionLink", text: action[1], url: action[2] });
      i = ACTION_LINK.lastIndex;
      continue;
    }

    if (c === "<") {
      HTML_TAG.lastIndex = i;
      const tag = HTML_TAG.exec(source);
      if (tag) {
        let end = HTML_TAG.lastIndex;
        if (/^<a[\s>]/i.test(tag[0])) {
          // keep the whole anchor as one token so its text is never relinked
          const close = source.toLowerCase().indexOf("</a>", end);
          if (close !== -1) end = close + "</a>".length;
        }
        push({ type: "html", html: source.slice(i, end) });
        i = end;
        continue;
      }
    }

    if (c === "!" && source[i + 1] === "[") {
      const image = parseLinkAt(source, i + 1);
      if (image) {
        push({ type: "image", alt: image.text, url: image.url });
        i = image.end;
        continue;
      }
    }

    if (c === "[") {
      const link = parseLinkAt(source, i);
      if (link) {
        push({ type: "link", url: link.url, title: link.title, children: parseInlines(link.text) });
        i = link.end;
        continue;
      }
    }

    if (c === "h" && !isWordChar(source[i - 1])) {
      AUTOLINK.lastIndex = i;
      const url = AUTOLINK.exec(source);
      if (url) {
        push({ type: "autolink", url: url[0] });
        i = AUTOLINK.lastIndex;
        continue;
      }
    }

    const pair = source.slice(i, i + 2);
    if (pair === "**" || pair === "__" || pair === "~~") {
      const opensWord = pair !== "__" || !isWordChar(source[i - 1]);
      if (opensWord && !isSpace(source[i + 2])) {
        const close = findClosing(source, pair, i + 2);
        if (close !== -1) {
          const children = parseInlines(source.slice(i + 2, close));
          push(pair === "~~" ? { type: "strikethrough", children } : { type: "strong", children });
          i = close + 2;
          continue;
        }
      }
    }

    if ((c === "*" || c === "_") && source[i + 1] !== c && !isSpace(source[i + 1])) {
      if (c === "*" || !isWordChar(source[i - 1])) {
        const close = findClosing(source, c, i + 1);
        if (close !== -1) {
          push({ type: "emphasis", children: parseInlines(source.slice(i + 1, close)) });
          i = close + 1;
          continue;
        }
      }
    }

    if (c === "`") {
      let run = 1;
      while (source[i + run] === "`") run++;
      const fence = "`".repeat(run);
      const close = source.indexOf(fence, i + run);
      if (close !== -1) {
        push({ type: "codespan", text: source.slice(i + run, close).replace(/^ (.*) $/s, "$1") });
        i = close + run;
        continue;
      }
      text += fence;
      i += run;
      continue;
    }

    if (c === "\n") {
      text = text.replace(/[ \t]+$/, "");
      push({ type: "lineBreak" });
      i++;
      continue;
    }

    text += c;
    i++;
  }

  flush();
  return out;
}
