export { Template } from "./template";
export type { TemplateOptions, TemplateValues } from "./template";
export {
  SMSMessageTemplate,
  SMSPreviewTemplate,
  addPrefix,
  getSmsFragmentCount,
  isUnicode,
} from "./sms";
export type { SMSMessageTemplateOptions, SMSPreviewTemplateOptions } from "./sms";
export {
  WithSubjectTemplate,
  PlainTextEmailTemplate,
  HTMLEmailTemplate,
  EmailPreviewTemplate,
  getHtmlEmailBody,
  PREHEADER_LENGTH_IN_CHARACTERS,
} from "./email";
export type { EmailPreviewTemplateOptions, HTMLEmailTemplateOptions, HtmlEmailBodyOptions } from "./email";
export { TemplateInputSchema } from "./types";
export type { EmailBranding, PersonalisationInput, TemplateInput, TemplateType, UserLanguage } from "./types";
