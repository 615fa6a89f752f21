import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { SMS_CHAR_COUNT_LIMIT } from "../../limits";
import {
  SMSMessageTemplate,
  SMSPreviewTemplate,
  addPrefix,
  getSmsFragmentCount,
  isUnicode,
} from "../index";

const LINK_STYLE = "word-wrap: break-word; color: #004795;";

describe("addPrefix", () => {
  it("prepends a trimmed prefix", () => {
    assert.equal(addPrefix("body", " Clinic "), "Clinic: body");
    assert.equal(addPrefix("body", null), "body");
    assert.equal(addPrefix("body", ""), "body");
  });
});

describe("getSmsFragmentCount", () => {
  it("uses 160/153 for GSM text", () => {
    assert.equal(getSmsFragmentCount(160, false), 1);
    assert.equal(getSmsFragmentCount(161, false), 2);
    assert.equal(getSmsFragmentCount(306, false), 2);
    assert.equal(getSmsFragmentCount(307, false), 3);
  });

  it("uses 70/67 for unicode text", () => {
    assert.equal(getSmsFragmentCount(70, true), 1);
    assert.equal(getSmsFragmentCount(71, true), 2);
    assert.equal(getSmsFragmentCount(135, true), 3);
  });
});

describe("isUnicode", () => {
  it("is true only for Welsh characters outside GSM", () => {
    assert.equal(isUnicode("Helo ŵ"), true);
    assert.equal(isUnicode("Café"), false);
  });
});

describe("SMSMessageTemplate", () => {
  it("renders prefix, values and punctuation clean-up", () => {
    const template = new SMSMessageTemplate(
      { content: "Hello ((name)) , how are you ?\r\nBye ." },
      { values: { name: "Jo" }, prefix: " Clinic " },
    );
    assert.equal(template.toString(), "Clinic: Hello Jo, how are you ?\nBye.");
  });

  it("drops the prefix when it is hidden", () => {
    const template = new SMSMessageTemplate({ content: "Hi" }, { prefix: "Clinic", showPrefix: false });
    assert.equal(template.prefix, null);
    assert.equal(template.toString(), "Hi");
  });

  it("downgrades characters outside the SMS alphabet", () => {
    const template = new SMSMessageTemplate({ content: "Cafá … “ok”" });
    assert.equal(template.toString(), 'Cafa ... "ok"');
  });

  it("counts content with the prefix when there are no values", () => {
    const template = new SMSMessageTemplate({ content: "  Hi ((name))  " }, { prefix: "Clinic" });
    assert.equal(template.contentCount, "Clinic: Hi ((name))".length);
  });

  it("counts the bare content when values are empty", () => {
    const template = new SMSMessageTemplate({ content: "Hi ((name))" }, { values: {} });
    assert.equal(template.contentCount, 11);
    assert.equal(template.fragmentCount, 1);
    assert.equal(template.isMessageTooLong(), false);
  });

  it("counts the rendered message when there are values", () => {
    const template = new SMSMessageTemplate({ content: "((x))" }, { values: { x: "a b" } });
    assert.equal(template.contentCount, 3);
  });

  it("splits into fragments at 160 characters", () => {
    assert.equal(new SMSMessageTemplate({ content: "a".repeat(160) }).fragmentCount, 1);
    assert.equal(new SMSMessageTemplate({ content: "a".repeat(161) }).fragmentCount, 2);
  });

  it("splits unicode messages at 70 characters", () => {
    assert.equal(new SMSMessageTemplate({ content: "ŵ".repeat(70) }).fragmentCount, 1);
    assert.equal(new SMSMessageTemplate({ content: "ŵ".repeat(71) }).fragmentCount, 2);
  });

  it("flags messages and names over the limits", () => {
    assert.equal(new SMSMessageTemplate({ content: "a".repeat(SMS_CHAR_COUNT_LIMIT) }).isMessageTooLong(), false);
    assert.equal(new SMSMessageTemplate({ content: "a".repeat(SMS_CHAR_COUNT_LIMIT + 1) }).isMessageTooLong(), true);
    assert.equal(new SMSMessageTemplate({ content: "Hi", name: "n".repeat(255) }).isNameTooLong(), false);
    assert.equal(new SMSMessageTemplate({ content: "Hi", name: "n".repeat(256) }).isNameTooLong(), true);
  });
});

describe("SMSPreviewTemplate", () => {
  it("escapes, breaks lines and links URLs", () => {
    const template = new SMSPreviewTemplate(
      { content: "Hi ((name))\nVisit https://example.com/x." },
      { values: { name: "<Jo>" }, prefix: "Svc" },
    );
    assert.equal(
      template.toString(),
      `<div class="sms-message-wrapper">Svc: Hi &lt;Jo&gt;<br>Visit <a style="${LINK_STYLE}" target="_blank" href="https://example.com/x">https://example.com/x</a>.</div>`,
    );
  });

  it("shows sender and recipient", () => {
    const template = new SMSPreviewTemplate(
      { content: "Hi" },
      {
        values: { "phone number": "07700 900123" },
        sender: "Clinic & Co",
        showSender: true,
        showRecipient: true,
      },
    );
    assert.equal(
      template.toString(),
      [
        '<div class="sms-message-sender">From: Clinic &amp; Co</div>',
        '<div class="sms-message-recipient">To: 07700 900123</div>',
        '<div class="sms-message-wrapper">Hi</div>',
      ].join("\n"),
    );
  });

  it("uses the French recipient placeholder", () => {
    const template = new SMSPreviewTemplate(
      { content: "Salut" },
      { showRecipient: true, userLanguage: "fr" },
    );
    assert.equal(
      template.toString(),
      [
        "<div class=\"sms-message-recipient\">À: <span class='placeholder'>((numéro de téléphone))</span></div>",
        '<div class="sms-message-wrapper">Salut</div>',
      ].join("\n"),
    );
  });

  it("can keep characters outside the SMS alphabet", () => {
    const template = new SMSPreviewTemplate({ content: "Cafá" }, { downgradeNonSmsCharacters: false });
    assert.equal(template.toString(), '<div class="sms-message-wrapper">Cafá</div>');
  });

  it("redacts missing personalisation", () => {
    const template = new SMSPreviewTemplate(
      { content: "((a)) ((b))" },
      { values: { a: "1" }, redactMissingPersonalisation: true },
    );
    assert.equal(
      template.toString(),
      "<div class=\"sms-message-wrapper\">1 <span class='placeholder-redacted'>hidden</span></div>",
    );
  });
});
