import { escapeHtml } from "../../formatters/html";
import type { UserLanguage } from "../types";
import { LABELS } from "./shared";

export type SmsPreviewParams = {
  body: string;
  sender: string | null;
  showSender: boolean;
  /** Called only when the recipient row is shown. */
  recipient: () => string;
  showRecipient: boolean;
  userLanguage: UserLanguage;
};

export function renderSmsPreview(params: SmsPreviewParams): string {
  const labels = LABELS[params.userLanguage];
  const parts: string[] = [];

  if (params.showSender && params.sender) {
    parts.push(`<div class="sms-message-sender">${labels.from}: ${escapeHtml(params.sender)}</div>`);
  }
  if (params.showRecipient) {
    parts.push(`<div class="sms-message-recipient">${labels.to}: ${params.recipient()}</div>`);
  }
  parts.push(`<div class="sms-message-wrapper">${params.body}</div>`);

  return parts.join("\n");
}
