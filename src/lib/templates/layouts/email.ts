/**
 * Email layout: table-based markup with inline styles only. Mail clients drop
 * <style> blocks.
 */

import { escapeHtml } from "../../formatters/html";
import type { EmailBranding } from "../types";
import { escapeAttribute } from "./shared";

export type EmailLayoutParams = {
  subject: string;
  body: string;
  preheader: string;
  completeHtml: boolean;
  branding: EmailBranding | null;
  textDirectionRtl: boolean;
};

const FONT = "font-family: Helvetica, Arial, sans-serif;";
const CONTENT_WIDTH = 580;

function brandingRows(branding: EmailBranding | null): string {
  if (!branding || (!branding.logoUrl && !branding.text)) return "";

  const rows: string[] = [];
  const withBackground = Boolean(branding.colour && branding.logoWithBackgroundColour);

  if (branding.colour && !withBackground) {
    rows.push(
      `<tr><td height="5" style="background-color: ${escapeAttribute(branding.colour)}; font-size: 0; line-height: 0;">&nbsp;</td></tr>`,
    );
  }

  const background = withBackground && branding.colour ? ` background-color: ${escapeAttribute(branding.colour)};` : "";
  const logo = branding.logoUrl
    ? `<img src="${escapeAttribute(branding.logoUrl)}" alt="${escapeAttribute(branding.altText ?? branding.name ?? "")}" height="108" style="display: block; border: 0;" />`
    : "";
  const text = branding.text
    ? `<span style="${FONT} font-size: 19px; font-weight: 700; line-height: 25px; color: #0B0C0C;">${escapeHtml(branding.text)}</span>`
    : "";
  rows.push(`<tr><td style="padding: 10px;${background}">${logo}${text}</td></tr>`);

  return rows.join("\n");
}

/** The message table: optional brand header, then the rendered body. */
export function renderEmailBody(params: Omit<EmailLayoutParams, "completeHtml" | "subject">): string {
  const dir = params.textDirectionRtl ? ` dir="rtl"` : "";
  const preheader = params.preheader
    ? `<span style="display: none; font-size: 1px; color: #FFFFFF; line-height: 1px; max-height: 0; max-width: 0; opacity: 0; overflow: hidden;">${params.preheader}</span>\n`
    : "";

  return `${preheader}<table role="presentation" width="100%" cellpadding="0" cellspacing="0" border="0" style="border-collapse: collapse; max-width: ${CONTENT_WIDTH}px;"${dir}>
${brandingRows(params.branding)}
<tr><td style="${FONT} font-size: 19px; line-height: 25px; color: #0B0C0C; padding: 10px;">
${params.body}
</td></tr>
</table>`;
}

export function renderEmailLayout(params: EmailLayoutParams): string {
  const table = renderEmailBody(params);
  if (!params.completeHtml) return table;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta http-equiv="Content-Type" content="text/html; charset=utf-8" />
  <meta name="viewport" content="width=device-width" />
  <title>${params.subject}</title>
</head>
<body style="${FONT} margin: 0; -webkit-text-size-adjust: none; text-size-adjust: none;">
${table}
</body>
</html>`;
}
