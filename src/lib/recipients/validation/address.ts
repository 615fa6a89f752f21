import { stripWhitespace } from "../../formatters/whitespace";
import { isAddressColumn, isOptionalAddressColumn } from "../headings";
import { InvalidAddressError, fail, ok, unwrap, type ValidationResult } from "./errors";

/**
 * Address lines 3 to 6 are optional and always pass. Any other column that
 * is not an address column is a programming error.
 */
export function checkAddress(
  addressLine: string | null | undefined,
  column: string,
): ValidationResult<string | null> {
  const line = addressLine ?? null;
  if (isOptionalAddressColumn(column)) return ok(line);
  if (!isAddressColumn(column)) throw new TypeError(`${column} is not an address column`);
  if (!line || !stripWhitespace(line)) return fail(new InvalidAddressError("Missing"));
  return ok(line);
}

export function validateAddress(addressLine: string | null | undefined, column: string): string | null {
  return unwrap(checkAddress(addressLine, column));
}
