/**
 * Email templates: subject handling, plain-text and HTML bodies, previews.
 */

import type { Columns } from "../columns";
import { Field, type FieldValues, type HtmlMode, type PlaceholderMeta } from "../field";
import { unescapeHtml } from "../formatters/html";
import { emailMarkdown, plainTextEmailMarkdown, preheaderMarkdown } from "../formatters/markdown";
import { Take } from "../formatters/take";
import { doNiceTypography } from "../formatters/typography";
import {
  addTrailingNewline,
  normaliseWhitespace,
  stripLeadingWhitespace,
  stripUnsupportedCharacters,
} from "../formatters/whitespace";
import { EMAIL_CHAR_COUNT_LIMIT, TEMPLATE_NAME_CHAR_COUNT_LIMIT } from "../limits";
import { renderEmailLayout } from "./layouts/email";
import { renderEmailPreview } from "./layouts/emailPreview";
import { Template, type TemplateOptions } from "./template";
import type { EmailBranding, UserLanguage } from "./types";

export const PREHEADER_LENGTH_IN_CHARACTERS = 256;

const EMAIL_RECIPIENT_PLACEHOLDER: Record<UserLanguage, string> = {
  en: "((email address))",
  fr: "((adresse courriel))",
};

export type HtmlEmailBodyOptions = {
  redactMissingPersonalisation?: boolean;
  html?: HtmlMode;
  assetDomain?: string;
};

export function getHtmlEmailBody(
  content: string,
  values: FieldValues,
  { redactMissingPersonalisation = false, html = "escape", assetDomain }: HtmlEmailBodyOptions = {},
): string {
  return new Take(
    new Field(content, values, { html, markdownLists: true, redactMissingPersonalisation }).toString(),
  )
    .then(stripUnsupportedCharacters)
    .then(addTrailingNewline)
    .then((value) => emailMarkdown(value, assetDomain))
    .then(doNiceTypography).value;
}

// ---------------------------------------------------------------------------
// WithSubjectTemplate
// ---------------------------------------------------------------------------

export class WithSubjectTemplate extends Template {
  constructor(template: unknown, options: TemplateOptions = {}) {
    super(template, options);
    if (typeof this.raw.subject !== "string") {
      throw new TypeError("Template must have a subject");
    }
  }

  protected get subjectSource(): string {
    return this.raw.subject ?? "";
  }

  get subject(): string {
    return new Take(
      new Field(this.subjectSource, this.values, {
        html: "escape",
        redactMissingPersonalisation: this.redactMissingPersonalisation,
      }).toString(),
    )
      .then(doNiceTypography)
      .then(normaliseWhitespace).value;
  }

  override get placeholderNames(): Set<string> {
    return new Set([
      ...new Field(this.subjectSource).placeholderNames,
      ...new Field(this.content).placeholderNames,
    ]);
  }

  override get placeholdersMeta(): Map<string, PlaceholderMeta> {
    const meta = new Field(this.subjectSource).placeholdersMeta;
    for (const [name, { isConditional }] of new Field(this.content).placeholdersMeta) {
      meta.set(name, { isConditional: isConditional || (meta.get(name)?.isConditional ?? false) });
    }
    return meta;
  }

  override toString(): string {
    return new Field(this.content, this.values, {
      html: "passthrough",
      redactMissingPersonalisation: this.redactMissingPersonalisation,
      markdownLists: true,
    }).toString();
  }
}

// ---------------------------------------------------------------------------
// PlainTextEmailTemplate
// ---------------------------------------------------------------------------

export class PlainTextEmailTemplate extends WithSubjectTemplate {
  override get subject(): string {
    return new Take(
      new Field(this.subjectSource, this.values, {
        html: "passthrough",
        redactMissingPersonalisation: this.redactMissingPersonalisation,
      }).toString(),
    )
      .then(doNiceTypography)
      .then(normaliseWhitespace).value;
  }

  override toString(): string {
    return new Take(
      new Field(this.content, this.values, { html: "passthrough", markdownLists: true }).toString(),
    )
      .then(stripUnsupportedCharacters)
      .then(addTrailingNewline)
      .then(plainTextEmailMarkdown)
      .then(doNiceTypography)
      .then(unescapeHtml)
      .then(stripLeadingWhitespace)
      .then(addTrailingNewline).value;
  }
}

// ---------------------------------------------------------------------------
// Shared sizing for HTML email and its preview
// ---------------------------------------------------------------------------

/**
 * Raw content length while personalisation is missing, otherwise the length
 * of the substituted Markdown.
 */
function emailContentCount(template: WithSubjectTemplate): number {
  if (template.missingData.length > 0) return template.content.length;
  return new Field(template.content, template.values, {
    html: "passthrough",
    markdownLists: true,
  }).toString().length;
}

function nameTooLong(name: string | null): boolean {
  return [...(name ?? "")].length > TEMPLATE_NAME_CHAR_COUNT_LIMIT;
}

// ---------------------------------------------------------------------------
// HTMLEmailTemplate
// ---------------------------------------------------------------------------

export type HTMLEmailTemplateOptions = Omit<TemplateOptions, "redactMissingPersonalisation"> & {
  completeHtml?: boolean;
  branding?: EmailBranding | null;
  allowHtml?: boolean;
  assetDomain?: string;
};

export class HTMLEmailTemplate extends WithSubjectTemplate {
  readonly completeHtml: boolean;
  readonly branding: EmailBranding | null;
  readonly allowHtml: boolean;
  readonly assetDomain: string | undefined;
  readonly textDirectionRtl: boolean;

  constructor(template: unknown, options: HTMLEmailTemplateOptions = {}) {
    super(template, { values: options.values });
    this.completeHtml = options.completeHtml ?? true;
    this.branding = options.branding ?? null;
    this.allowHtml = options.allowHtml ?? false;
    this.assetDomain = options.assetDomain;
    this.textDirectionRtl = this.raw.text_direction_rtl ?? false;
  }

  /** Opening words of the message, shown by mail clients beside the subject. */
  get preheader(): string {
    const text = new Take(
      new Field(this.content, this.values, {
        html: this.allowHtml ? "strip" : "escape",
        markdownLists: true,
      }).toString(),
    )
      .then(stripUnsupportedCharacters)
      .then(addTrailingNewline)
      .then(preheaderMarkdown)
      .then(doNiceTypography).value;

    const words = text.split(/\s+/u).filter(Boolean).join(" ");
    return [...words].slice(0, PREHEADER_LENGTH_IN_CHARACTERS).join("").trim();
  }

  get contentCount(): number {
    return emailContentCount(this);
  }

  override isMessageTooLong(): boolean {
    return this.contentCount > EMAIL_CHAR_COUNT_LIMIT;
  }

  override isNameTooLong(): boolean {
    return nameTooLong(this.name);
  }

  override toString(): string {
    return renderEmailLayout({
      subject: this.subject,
      body: getHtmlEmailBody(this.content, this.values, {
        html: this.allowHtml ? "passthrough" : "escape",
        assetDomain: this.assetDomain,
      }),
      preheader: this.preheader,
      completeHtml: this.completeHtml,
      branding: this.branding,
      textDirectionRtl: this.textDirectionRtl,
    });
  }
}

// ---------------------------------------------------------------------------
// EmailPreviewTemplate
// ---------------------------------------------------------------------------

export type EmailPreviewTemplateOptions = TemplateOptions & {
  fromName?: string | null;
  fromAddress?: string | null;
  replyTo?: string | null;
  showRecipient?: boolean;
  branding?: EmailBranding | null;
  assetDomain?: string;
  allowHtml?: boolean;
  userLanguage?: UserLanguage;
};

export class EmailPreviewTemplate extends WithSubjectTemplate {
  readonly fromName: string | null;
  readonly fromAddress: string | null;
  readonly replyTo: string | null;
  readonly showRecipient: boolean;
  readonly branding: EmailBranding | null;
  readonly assetDomain: string | undefined;
  readonly allowHtml: boolean;
  readonly userLanguage: UserLanguage;
  readonly textDirectionRtl: boolean;

  constructor(template: unknown, options: EmailPreviewTemplateOptions = {}) {
    super(template, options);
    this.fromName = options.fromName ?? null;
    this.fromAddress = options.fromAddress ?? null;
    this.replyTo = options.replyTo ?? null;
    this.showRecipient = options.showRecipient ?? true;
    this.branding = options.branding ?? null;
    this.assetDomain = options.assetDomain;
    this.allowHtml = options.allowHtml ?? false;
    this.userLanguage = options.userLanguage ?? "en";
    this.textDirectionRtl = this.raw.text_direction_rtl ?? false;
  }

  get contentCount(): number {
    return emailContentCount(this);
  }

  override isMessageTooLong(): boolean {
    return this.contentCount > EMAIL_CHAR_COUNT_LIMIT;
  }

  override isNameTooLong(): boolean {
    return nameTooLong(this.name);
  }

  override toString(): string {
    const values: Columns<unknown> = this.values;
    return renderEmailPreview({
      subject: this.subject,
      body: getHtmlEmailBody(this.content, values, {
        redactMissingPersonalisation: this.redactMissingPersonalisation,
        html: this.allowHtml ? "passthrough" : "escape",
        assetDomain: this.assetDomain,
      }),
      fromName: this.fromName,
      fromAddress: this.fromAddress,
      replyTo: this.replyTo,
      recipient: () => new Field(EMAIL_RECIPIENT_PLACEHOLDER[this.userLanguage], values).toString(),
      showRecipient: this.showRecipient,
      branding: this.branding,
      textDirectionRtl: this.textDirectionRtl,
      userLanguage: this.userLanguage,
    });
  }
}
