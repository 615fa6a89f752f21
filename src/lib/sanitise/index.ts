export {
  SanitiseText,
  SanitiseSMS,
  SanitiseASCII,
  WELSH_NON_GSM_CHARACTERS,
  FRENCH_NON_GSM_CHARACTERS,
  getUnicodeCharFromCodepoint,
  smsEncode,
} from "./sanitiseText";
