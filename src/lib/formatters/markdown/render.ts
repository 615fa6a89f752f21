import { parseMarkdown } from "./parser";
import type { Block, Inline, MarkdownRenderer } from "./types";

function renderInlines(nodes: readonly Inline[], r: MarkdownRenderer): string {
  return nodes.map((node) => renderInline(node, r)).join("");
}

function renderInline(node: Inline, r: MarkdownRenderer): string {
  switch (node.type) {
    case "text":
      return r.text(node.text);
    case "html":
      return r.html(node.html);
    case "strong":
      return r.strong(renderInlines(node.children, r));
    case "emphasis":
      return r.emphasis(renderInlines(node.children, r));
    case "strikethrough":
      return r.strikethrough(renderInlines(node.children, r));
    case "codespan":
      return r.codespan(node.text);
    case "link":
      return r.link(renderInlines(node.children, r), node.url, node.title);
    case "autolink":
      return r.autolink(node.url);
    case "actionLink":
      return r.actionLink(node.text, node.url);
    case "image":
      return r.image(node.alt, node.url);
    case "lineBreak":
      return r.lineBreak();
  }
}

function renderBlocks(blocks: readonly Block[], r: MarkdownRenderer): string[] {
  return blocks.map((block) => renderBlock(block, r)).filter((html) => html !== "");
}

function renderBlock(block: Block, r: MarkdownRenderer): string {
  switch (block.type) {
    case "paragraph":
      return r.paragraph(renderInlines(block.children, r));
    case "heading":
      return r.heading(renderInlines(block.children, r), block.level);
    case "blockQuote":
      return r.blockQuote(renderBlocks(block.children, r));
    case "list":
      return r.list(
        block.items.map((item) => renderInlines(item, r)),
        block.ordered,
        block.start,
      );
    case "thematicBreak":
      return r.thematicBreak();
    case "code":
      return r.code(block.text);
    case "table":
      return r.table(block.rows);
  }
}

export function renderMarkdown(source: string, renderer: MarkdownRenderer): string {
  return renderer.document(renderBlocks(parseMarkdown(source), renderer));
}
