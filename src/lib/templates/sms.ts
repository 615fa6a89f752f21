/**
 * SMS templates: plain message body, length accounting and the HTML preview.
 */

import { Field } from "../field";
import { escapeHtml, autolinkSms, nl2br } from "../formatters/html";
import { Take } from "../formatters/take";
import { normaliseNewlines, removeWhitespaceBeforePunctuation } from "../formatters/whitespace";
import { SMS_CHAR_COUNT_LIMIT, TEMPLATE_NAME_CHAR_COUNT_LIMIT } from "../limits";
import { WELSH_NON_GSM_CHARACTERS, smsEncode } from "../sanitise";
import { renderSmsPreview } from "./layouts/smsPreview";
import { Template, type TemplateOptions } from "./template";
import type { UserLanguage } from "./types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function addPrefix(body: string, prefix?: string | null): string {
  return prefix ? `${prefix.trim()}: ${body}` : body;
}

/** True when the text needs the unicode SMS encoding. */
export function isUnicode(content: string): boolean {
  for (const c of content) {
    if (WELSH_NON_GSM_CHARACTERS.has(c)) return true;
  }
  return false;
}

export function getSmsFragmentCount(characterCount: number, unicode: boolean): number {
  if (unicode) return characterCount <= 70 ? 1 : Math.ceil(characterCount / 67);
  return characterCount <= 160 ? 1 : Math.ceil(characterCount / 153);
}

function codePointLength(value: string): number {
  return [...value].length;
}

const SMS_RECIPIENT_PLACEHOLDER: Record<UserLanguage, string> = {
  en: "((phone number))",
  fr: "((numéro de téléphone))",
};

// ---------------------------------------------------------------------------
// SMSMessageTemplate
// ---------------------------------------------------------------------------

export type SMSMessageTemplateOptions = TemplateOptions & {
  prefix?: string | null;
  showPrefix?: boolean;
  sender?: string | null;
};

export class SMSMessageTemplate extends Template {
  readonly showPrefix: boolean;
  readonly sender: string | null;
  private readonly rawPrefix: string | null;

  constructor(template: unknown, options: SMSMessageTemplateOptions = {}) {
    super(template, options);
    this.rawPrefix = options.prefix ?? null;
    this.showPrefix = options.showPrefix ?? true;
    this.sender = options.sender ?? null;
  }

  get prefix(): string | null {
    return this.showPrefix ? this.rawPrefix : null;
  }

  override toString(): string {
    return this.messageBody();
  }

  /** Code points in the message as it will be sent. */
  get contentCount(): number {
    const text =
      this.values.size > 0
        ? this.messageBody()
        : smsEncode(addPrefix(this.content.trim(), this.prefix));
    return codePointLength(text);
  }

  get fragmentCount(): number {
    return getSmsFragmentCount(this.contentCount, isUnicode(this.toString()));
  }

  override isMessageTooLong(): boolean {
    return this.contentCount > SMS_CHAR_COUNT_LIMIT;
  }

  override isNameTooLong(): boolean {
    return codePointLength(this.name ?? "") > TEMPLATE_NAME_CHAR_COUNT_LIMIT;
  }

  // Preview subclasses change toString, never this.
  private messageBody(): string {
    return new Take(new Field(this.content, this.values, { html: "passthrough" }).toString())
      .then(addPrefix, this.prefix)
      .then(smsEncode)
      .then(removeWhitespaceBeforePunctuation)
      .then(normaliseNewlines)
      .then((value) => value.trim()).value;
  }
}

// ---------------------------------------------------------------------------
// SMSPreviewTemplate
// ---------------------------------------------------------------------------

export type SMSPreviewTemplateOptions = SMSMessageTemplateOptions & {
  showRecipient?: boolean;
  showSender?: boolean;
  downgradeNonSmsCharacters?: boolean;
  userLanguage?: UserLanguage;
};

export class SMSPreviewTemplate extends SMSMessageTemplate {
  readonly showRecipient: boolean;
  readonly showSender: boolean;
  readonly downgradeNonSmsCharacters: boolean;
  readonly userLanguage: UserLanguage;

  constructor(template: unknown, options: SMSPreviewTemplateOptions = {}) {
    super(template, options);
    this.showRecipient = options.showRecipient ?? false;
    this.showSender = options.showSender ?? false;
    this.downgradeNonSmsCharacters = options.downgradeNonSmsCharacters ?? true;
    this.userLanguage = options.userLanguage ?? "en";
  }

  override toString(): string {
    const prefix = escapeHtml(this.prefix ?? "") || null;
    const encode: (value: string) => string = this.downgradeNonSmsCharacters
      ? smsEncode
      : (value) => value;

    const body = new Take(
      new Field(this.content, this.values, {
        html: "escape",
        redactMissingPersonalisation: this.redactMissingPersonalisation,
      }).toString(),
    )
      .then(addPrefix, prefix)
      .then(encode)
      .then(removeWhitespaceBeforePunctuation)
      .then(nl2br)
      .then(autolinkSms).value;

    return renderSmsPreview({
      body,
      sender: this.sender,
      showSender: this.showSender,
      recipient: () =>
        new Field(SMS_RECIPIENT_PLACEHOLDER[this.userLanguage], this.values, { html: "escape" }).toString(),
      showRecipient: this.showRecipient,
      userLanguage: this.userLanguage,
    });
  }
}
