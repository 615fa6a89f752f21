export * from "./whitespace";
export * from "./html";
export * from "./lists";
export * from "./typography";
export { Take } from "./take";
export {
  emailMarkdown,
  plainTextEmailMarkdown,
  preheaderMarkdown,
  renderMarkdown,
  parseMarkdown,
  createHtmlRenderer,
  plainTextRenderer,
  preheaderRenderer,
  actionLinkImageUrl,
  COLUMN_WIDTH,
} from "./markdown";
export type { MarkdownRenderer, Block, Inline, HeadingLevel } from "./markdown";
