import { serverEnv } from "../../env/server";
import { createHtmlRenderer } from "./htmlRenderer";
import { plainTextRenderer, preheaderRenderer } from "./plainTextRenderer";
import { renderMarkdown } from "./render";

export type { Block, Inline, HeadingLevel, MarkdownRenderer } from "./types";
export { parseMarkdown, parseInlines } from "./parser";
export { renderMarkdown } from "./render";
export { createHtmlRenderer, LINK_STYLE, PARAGRAPH_STYLE } from "./htmlRenderer";
export { plainTextRenderer, preheaderRenderer, COLUMN_WIDTH } from "./plainTextRenderer";

export function actionLinkImageUrl(assetDomain = serverEnv().NOTIFY_ASSET_DOMAIN): string {
  return `https://${assetDomain}/img/action-link.png`;
}

export function emailMarkdown(source: string, assetDomain?: string): string {
  return renderMarkdown(
    source,
    createHtmlRenderer({ actionLinkImageUrl: actionLinkImageUrl(assetDomain) }),
  );
}

export function plainTextEmailMarkdown(source: string): string {
  return renderMarkdown(source, plainTextRenderer);
}

export function preheaderMarkdown(source: string): string {
  return renderMarkdown(source, preheaderRenderer);
}
