import { describe, it, mock } from "node:test";
import assert from "node:assert/strict";

import { Cell } from "../../columns";
import { SMS_CUSTOM_CONTENT_TOO_LONG_ERROR } from "../../limits";
import { SMSMessageTemplate } from "../../templates";
import { RecipientCSV } from "../recipientCsv";

function indexes(rows: Iterable<{ index: number }>): number[] {
  return [...rows].map((row) => row.index);
}

describe("RecipientCSV rows", () => {
  const csv = new RecipientCSV("phone number,name\n202-555-0123,Jo\n12345,Al\n202-555-0124,", {
    templateType: "sms",
    placeholders: ["name"],
  });

  it("parses every data row", () => {
    assert.equal(csv.length, 3);
    assert.deepEqual(csv.columnHeaders, ["phone number", "name"]);
    assert.deepEqual(csv.placeholders, ["name", "phone number"]);
    assert.deepEqual(csv.placeholdersAsColumnKeys, ["name", "phonenumber"]);
  });

  it("exposes cells by normalized key", () => {
    const row = csv.at(0);
    assert.ok(row);
    assert.equal(row.get("Phone_Number").data, "202-555-0123");
    assert.equal(row.get("name").data, "Jo");
    assert.equal(row.recipient, "202-555-0123");
    assert.equal(row.personalisation.get("NAME"), "Jo");
    assert.equal(row.hasError, false);
  });

  it("records recipient and missing-data errors on cells", () => {
    assert.equal(csv.at(1)?.get("phone number").error, "Not a valid local number");
    assert.equal(csv.at(2)?.get("name").error, Cell.missingFieldError);
    assert.deepEqual(indexes(csv.rowsWithErrors), [1, 2]);
    assert.deepEqual(indexes(csv.rowsWithBadRecipients), [1]);
    assert.deepEqual(indexes(csv.rowsWithMissingData), [2]);
    assert.equal(csv.hasErrors, true);
  });

  it("shows the rows with errors first", () => {
    assert.deepEqual(indexes(csv.displayedRows), [1, 2]);
  });

  it("marks columns outside the placeholders as ignored", () => {
    const extra = new RecipientCSV("phone number,notes\n202-555-0123,", { templateType: "sms" });
    const row = extra.at(0);
    assert.ok(row);
    assert.equal(row.get("notes").ignore, true);
    assert.equal(row.get("notes").error, null);
    assert.equal(row.get("phone number").ignore, false);
  });

  it("keeps surplus cells under the null key", () => {
    const wide = new RecipientCSV("phone number\n202-555-0123,extra,more", { templateType: "sms" });
    assert.deepEqual(wide.at(0)?.get(null).data, ["extra", "more"]);
  });

  it("collects repeated headers into a list", () => {
    const repeated = new RecipientCSV("phone number,colour,colour\n202-555-0123,red,blue", {
      templateType: "sms",
      placeholders: ["colour"],
    });
    assert.deepEqual(repeated.at(0)?.get("colour").data, ["red", "blue"]);
  });
});

describe("RecipientCSV headers", () => {
  it("reports missing placeholder and recipient columns", () => {
    const csv = new RecipientCSV("name\nJo", { templateType: "sms", placeholders: ["name", "age"] });
    assert.deepEqual([...csv.missingColumnHeaders], ["age", "phone number"]);
    assert.equal(csv.hasRecipientColumns, false);
    assert.equal(csv.hasErrors, true);
  });

  it("accepts the recipient heading in the other language", () => {
    const csv = new RecipientCSV("adresse courriel\nsomeone@example.com", { templateType: "email" });
    assert.equal(csv.missingColumnHeaders.size, 0);
    assert.equal(csv.hasRecipientColumns, true);
    assert.equal(csv.at(0)?.recipient, "someone@example.com");
  });

  it("finds duplicate recipient columns", () => {
    const csv = new RecipientCSV("phone number,Phone_Number\n202-555-0123,202-555-0124", {
      templateType: "sms",
    });
    assert.deepEqual([...csv.duplicateRecipientColumnHeaders], ["phone number", "Phone_Number"]);
    assert.equal(csv.hasErrors, true);
  });

  it("does not report a blank recipient as missing when the column is duplicated", () => {
    const csv = new RecipientCSV("phone number,phone number\n202-555-0123,", { templateType: "sms" });
    assert.equal(csv.at(0)?.get("phone number").error, null);
    assert.deepEqual([...csv.duplicateRecipientColumnHeaders], ["phone number"]);
    assert.equal(csv.hasErrors, true);
  });

  it("reports a blank recipient in a single column as missing", () => {
    const csv = new RecipientCSV("phone number,name\n,Jo", { templateType: "sms", placeholders: ["name"] });
    assert.equal(csv.at(0)?.get("phone number").error, Cell.missingFieldError);
    assert.deepEqual(indexes(csv.rowsWithMissingData), [0]);
    assert.equal(csv.hasErrors, true);
  });

  it("requires every mandatory address line for letters", () => {
    const csv = new RecipientCSV("address line 1,address line 2\n1 Main St,Springfield", {
      templateType: "letter",
    });
    assert.deepEqual([...csv.missingColumnHeaders], ["postcode"]);
  });

  it("validates address cells and skips optional lines", () => {
    const csv = new RecipientCSV("address line 1,address line 2,address line 3,postcode\n1 Main St,,,AB1 2CD", {
      templateType: "letter",
    });
    const row = csv.at(0);
    assert.ok(row);
    assert.equal(csv.missingColumnHeaders.size, 0);
    assert.equal(row.get("address line 1").error, null);
    assert.equal(row.get("address line 2").error, Cell.missingFieldError);
    assert.equal(row.get("address line 3").error, null);
    assert.equal(row.hasBadRecipient, false);
  });
});

describe("RecipientCSV sending", () => {
  it("checks recipients against the safelist", () => {
    const csv = new RecipientCSV("email address\nsomeone@example.com\nother@example.com", {
      templateType: "email",
      safelist: ["Someone@Example.com"],
    });
    assert.equal(csv.allowedToSendTo, false);

    csv.safelist = ["someone@example.com", "OTHER@example.com"];
    assert.equal(csv.allowedToSendTo, true);
    assert.equal(csv.hasErrors, false);
  });

  it("allows anyone without a safelist", () => {
    const csv = new RecipientCSV("email address\nsomeone@example.com", { templateType: "email" });
    assert.equal(csv.allowedToSendTo, true);
  });

  it("flags rows beyond the remaining allowance", () => {
    const csv = new RecipientCSV("phone number\n202-555-0123\n202-555-0124\n202-555-0125", {
      templateType: "sms",
      remainingMessages: 2,
      remainingDailyMessages: 3,
      remainingAnnualMessages: 1,
    });
    assert.equal(csv.moreRowsThanCanSend, true);
    assert.equal(csv.moreRowsThanCanSendToday, false);
    assert.equal(csv.moreRowsThanCanSendThisYear, true);
    assert.equal(csv.hasErrors, true);
  });

  it("stops building rows past maxRows", () => {
    const warn = mock.method(console, "warn", () => undefined);
    try {
      const csv = new RecipientCSV("phone number\n202-555-0123\n202-555-0124\n202-555-0125", {
        templateType: "sms",
        maxRows: 2,
      });
      assert.equal(csv.length, 3);
      assert.equal(csv.at(2), null);
      assert.equal(csv.tooManyRows, true);
      assert.deepEqual(indexes(csv.initialRows), [0, 1]);
      assert.equal(warn.mock.callCount(), 1);
      assert.deepEqual(warn.mock.calls[0].arguments, ["[recipients] csv exceeds max rows", { rows: 3, maxRows: 2 }]);
    } finally {
      warn.mock.restore();
    }
  });

  it("limits the initial rows shown", () => {
    const csv = new RecipientCSV("phone number\n202-555-0123\n202-555-0124\n202-555-0125", {
      templateType: "sms",
      maxInitialRowsShown: 1,
    });
    assert.deepEqual(indexes(csv.initialRows), [0]);
    assert.deepEqual(indexes(csv.displayedRows), [0]);
  });
});

describe("RecipientCSV message length", () => {
  const content = "Hello ((name))";

  it("flags custom content that cannot fit in an SMS", () => {
    const template = new SMSMessageTemplate({ content, template_type: "sms" });
    const csv = new RecipientCSV(`phone number,name\n202-555-0123,${"a".repeat(601)}`, {
      templateType: "sms",
      placeholders: template.placeholderNames,
      template,
    });
    const row = csv.at(0);
    assert.ok(row);
    assert.equal(row.get("name").error, SMS_CUSTOM_CONTENT_TOO_LONG_ERROR);
    assert.equal(row.get("name").recipientError, false);
    assert.equal(row.hasBadRecipient, false);
    assert.equal(row.messageTooLong, false);
    assert.deepEqual(indexes(csv.rowsWithCombinedVariableContentTooLong), [0]);
  });

  it("flags rows whose rendered message is too long", () => {
    const template = new SMSMessageTemplate({ content, template_type: "sms" }, { prefix: "Service" });
    const csv = new RecipientCSV(`phone number,name\n202-555-0123,${"a".repeat(598)}`, {
      templateType: "sms",
      placeholders: template.placeholderNames,
      template,
    });
    const row = csv.at(0);
    assert.ok(row);
    assert.equal(row.get("name").error, null);
    assert.equal(row.messageTooLong, true);
    assert.deepEqual(indexes(csv.rowsWithMessageTooLong), [0]);
    assert.deepEqual(indexes(csv.rowsWithCombinedVariableContentTooLong), []);
    assert.equal(csv.hasErrors, true);
  });

  it("does not fail on rows with missing values", () => {
    const template = new SMSMessageTemplate({ content, template_type: "sms" });
    const csv = new RecipientCSV("phone number,name\n202-555-0123,", {
      templateType: "sms",
      placeholders: template.placeholderNames,
      template,
    });
    assert.equal(csv.at(0)?.messageTooLong, false);
    assert.equal(csv.at(0)?.hasMissingData, true);
  });

  it("counts fragments across rows", () => {
    const template = new SMSMessageTemplate({ content, template_type: "sms" });
    const csv = new RecipientCSV(
      `phone number,name\n202-555-0123,Jo\n202-555-0124,${"a".repeat(200)}\n202-555-0125`,
      { templateType: "sms", placeholders: template.placeholderNames, template },
    );
    assert.equal(csv.smsFragmentCount, 4);
  });

  it("counts one fragment per row without a template", () => {
    const csv = new RecipientCSV("phone number\n202-555-0123\n202-555-0124", { templateType: "sms" });
    assert.equal(csv.smsFragmentCount, 2);
    const email = new RecipientCSV("email address\nsomeone@example.com", { templateType: "email" });
    assert.equal(email.smsFragmentCount, 0);
  });
});
