import { z } from "zod";

export type TemplateType = "sms" | "email" | "letter";

export type UserLanguage = "en" | "fr";

export const TemplateInputSchema = z
  .object({
    content: z.string(),
    id: z.string().nullish(),
    name: z.string().nullish(),
    subject: z.string().nullish(),
    template_type: z.enum(["sms", "email", "letter"]).nullish(),
    text_direction_rtl: z.boolean().nullish(),
  })
  .passthrough();

export type TemplateInput = z.infer<typeof TemplateInputSchema>;

/** Personalisation as callers supply it; keys are matched as column keys. */
export type PersonalisationInput =
  | Readonly<Record<string, unknown>>
  | ReadonlyMap<string | null, unknown>;

export type EmailBranding = {
  name?: string | null;
  logoUrl?: string | null;
  text?: string | null;
  colour?: string | null;
  logoWithBackgroundColour?: boolean;
  altText?: string | null;
};
