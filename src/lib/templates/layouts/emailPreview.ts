import { escapeHtml } from "../../formatters/html";
import type { EmailBranding, UserLanguage } from "../types";
import { renderEmailBody } from "./email";
import { LABELS } from "./shared";

export type EmailPreviewParams = {
  subject: string;
  body: string;
  fromName: string | null;
  fromAddress: string | null;
  replyTo: string | null;
  /** Called only when the recipient row is shown. */
  recipient: () => string;
  showRecipient: boolean;
  branding: EmailBranding | null;
  textDirectionRtl: boolean;
  userLanguage: UserLanguage;
};

function headerRow(label: string, value: string): string {
  return `<tr><th scope="row" class="email-message-meta-label">${label}</th><td class="email-message-meta-value">${value}</td></tr>`;
}

export function renderEmailPreview(params: EmailPreviewParams): string {
  const labels = LABELS[params.userLanguage];
  const rows: string[] = [];

  if (params.fromName) {
    const address = params.fromAddress ? ` &lt;${escapeHtml(params.fromAddress)}&gt;` : "";
    rows.push(headerRow(labels.from, `${escapeHtml(params.fromName)}${address}`));
  }
  if (params.replyTo) rows.push(headerRow(labels.replyTo, escapeHtml(params.replyTo)));
  if (params.showRecipient) rows.push(headerRow(labels.to, params.recipient()));
  rows.push(headerRow(labels.subject, params.subject));

  const body = renderEmailBody({
    body: params.body,
    preheader: "",
    branding: params.branding,
    textDirectionRtl: params.textDirectionRtl,
  });

  return `<table class="email-message-meta">\n${rows.join("\n")}\n</table>\n<div class="email-message-body">\n${body}\n</div>`;
}
