import type { UserLanguage } from "../types";

export { escapeAttribute } from "../../formatters/html";

export const LABELS: Record<UserLanguage, Record<"from" | "replyTo" | "to" | "subject", string>> = {
  en: { from: "From", replyTo: "Reply to", to: "To", subject: "Subject" },
  fr: { from: "De", replyTo: "Répondre à", to: "À", subject: "Objet" },
};
