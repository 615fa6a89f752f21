/**
 * Markdown subset: AST and renderer contract
 */

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type Inline =
  | { type: "text"; text: string }
  | { type: "html"; html: string }
  | { type: "strong"; children: Inline[] }
  | { type: "emphasis"; children: Inline[] }
  | { type: "strikethrough"; children: Inline[] }
  | { type: "codespan"; text: string }
  | { type: "link"; url: string; title: string | null; children: Inline[] }
  | { type: "autolink"; url: string }
  | { type: "actionLink"; url: string; text: string }
  | { type: "image"; url: string; alt: string }
  | { type: "lineBreak" };

export type Block =
  | { type: "paragraph"; children: Inline[] }
  | { type: "heading"; level: HeadingLevel; children: Inline[] }
  | { type: "blockQuote"; children: Block[] }
  | { type: "list"; ordered: boolean; start: number; items: Inline[][] }
  | { type: "thematicBreak" }
  | { type: "code"; text: string }
  | { type: "table"; rows: string[] };

/**
 * One implementation per output channel. Block methods receive already
 * rendered children; returning "" drops the block.
 */
export interface MarkdownRenderer {
  document(blocks: string[]): string;

  paragraph(content: string): string;
  heading(content: string, level: HeadingLevel): string;
  blockQuote(blocks: string[]): string;
  list(items: string[], ordered: boolean, start: number): string;
  thematicBreak(): string;
  code(text: string): string;
  table(rows: string[]): string;

  text(text: string): string;
  html(html: string): string;
  strong(content: string): string;
  emphasis(content: string): string;
  strikethrough(content: string): string;
  codespan(text: string): string;
  link(content: string, url: string, title: string | null): string;
  autolink(url: string): string;
  actionLink(text: string, url: string): string;
  image(alt: string, url: string): string;
  lineBreak(): string;
}
