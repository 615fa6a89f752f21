import { describe, it, mock } from "node:test";
import assert from "node:assert/strict";

import {
  InvalidPhoneError,
  checkPhoneNumber,
  formatPhoneNumberHumanReadable,
  getInternationalPhoneInfo,
  isLocalPhoneNumber,
  normalisePhoneNumber,
  tryValidateAndFormatPhoneNumber,
  validatePhoneNumber,
} from "../index";

// The region defaults to US with calling code 1.
const LOCAL_NUMBERS = ["2025550123", "+12025550123", "+1 202-555-0123", "202-555-0123", "12025550123", "1 2025550123"];

function errorMessage(number: string, international = false): string | null {
  const result = checkPhoneNumber(number, { international });
  return result.ok ? null : result.error.message;
}

describe("checkPhoneNumber", () => {
  for (const number of LOCAL_NUMBERS) {
    it(`formats ${number} as E.164`, () => {
      assert.deepEqual(checkPhoneNumber(number), { ok: true, value: "+12025550123" });
    });
  }

  it("accepts other numbers sharing the local calling code", () => {
    assert.equal(validatePhoneNumber("1-202-555-0104"), "+12025550104");
  });

  it("rejects semicolons", () => {
    assert.equal(errorMessage("202-555-0123;202-555-0124"), "Not a valid number");
  });

  it("rejects numbers that are not local", () => {
    assert.equal(errorMessage("12345"), "Not a valid local number");
    assert.equal(errorMessage("+447900900123"), "Not a valid local number");
  });

  it("accepts international numbers when allowed", () => {
    assert.equal(validatePhoneNumber("+44 7900 900123", { international: true }), "+447900900123");
    assert.equal(validatePhoneNumber("202 555 0123", { international: true }), "+12025550123");
  });

  it("rejects international numbers that do not parse", () => {
    assert.equal(errorMessage("+999 1234", true), "Not a valid international number");
  });

  it("reports a missing number", () => {
    assert.equal(checkPhoneNumber(null).ok, false);
  });

  it("throws from the validating wrapper", () => {
    assert.throws(() => validatePhoneNumber("12345"), InvalidPhoneError);
  });
});

describe("phone helpers", () => {
  it("normalises local and international numbers", () => {
    assert.equal(normalisePhoneNumber("202 555 0123"), "+12025550123");
    assert.equal(normalisePhoneNumber("+44 7900 900123"), "+447900900123");
    assert.equal(normalisePhoneNumber("hello"), null);
  });

  it("tells local numbers apart", () => {
    assert.equal(isLocalPhoneNumber("202 555 0123"), true);
    assert.equal(isLocalPhoneNumber("+447900900123"), false);
  });

  it("describes international numbers", () => {
    assert.deepEqual(getInternationalPhoneInfo("+447900900123"), { international: true, countryPrefix: "44" });
    assert.deepEqual(getInternationalPhoneInfo("202-555-0123"), { international: false, countryPrefix: "1" });
  });

  it("formats for people", () => {
    assert.equal(formatPhoneNumberHumanReadable("2025550123"), "+1 202 555 0123");
    assert.equal(formatPhoneNumberHumanReadable("not a number"), "not a number");
  });
});

describe("tryValidateAndFormatPhoneNumber", () => {
  it("formats valid numbers", () => {
    assert.equal(tryValidateAndFormatPhoneNumber("202-555-0123"), "+12025550123");
  });

  it("returns invalid input unchanged and logs when asked", () => {
    const warn = mock.method(console, "warn", () => undefined);
    try {
      assert.equal(tryValidateAndFormatPhoneNumber("nope", { logMessage: "provider sent a bad number" }), "nope");
      assert.equal(warn.mock.callCount(), 1);
      assert.deepEqual(warn.mock.calls[0].arguments, [
        "[recipients] provider sent a bad number",
        { error: "Not a valid local number" },
      ]);
    } finally {
      warn.mock.restore();
    }
  });

  it("stays quiet without a log message", () => {
    const warn = mock.method(console, "warn", () => undefined);
    try {
      assert.equal(tryValidateAndFormatPhoneNumber("nope"), "nope");
      assert.equal(warn.mock.callCount(), 0);
    } finally {
      warn.mock.restore();
    }
  });
});
