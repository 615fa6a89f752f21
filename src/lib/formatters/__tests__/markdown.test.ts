import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  COLUMN_WIDTH,
  emailMarkdown,
  parseMarkdown,
  plainTextEmailMarkdown,
  preheaderMarkdown,
} from "../index";
import { LINK_STYLE, PARAGRAPH_STYLE } from "../markdown";

const P = `<p style="${PARAGRAPH_STYLE}">`;
const ASSETS = "assets.test";
const html = (source: string) => emailMarkdown(source, ASSETS);

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

describe("parseMarkdown", () => {
  it("keeps a list together across blank lines", () => {
    assert.deepEqual(
      parseMarkdown("* a\n\n* b\n\ntext").map((block) => block.type),
      ["list", "paragraph"],
    );
  });

  it("accepts ordered items without a space", () => {
    assert.deepEqual(parseMarkdown("1.one\n2.two"), [
      {
        type: "list",
        ordered: true,
        start: 1,
        items: [[{ type: "text", text: "one" }], [{ type: "text", text: "two" }]],
      },
    ]);
  });

  it("does not read decimals as list items", () => {
    assert.equal(parseMarkdown("3.5 million")[0].type, "paragraph");
  });
});

// ---------------------------------------------------------------------------
// HTML
// ---------------------------------------------------------------------------

describe("emailMarkdown", () => {
  it("renders paragraphs with hard line breaks", () => {
    assert.equal(
      html("line one\nline two\n\nnew paragraph"),
      `${P}line one<br />line two</p>\n${P}new paragraph</p>`,
    );
  });

  it("renders headings with and without a space", () => {
    for (const source of ["# heading", "#heading"]) {
      const out = html(source);
      assert.ok(out.startsWith('<h1 style="Margin: 0 0 16px 0;'), out);
      assert.ok(out.endsWith(">heading</h1>"), out);
    }
    assert.ok(html("## sub").startsWith('<h2 style="'));
  });

  it("renders every bullet style as one unordered list", () => {
    const out = html("* one\n- two\n• three\n+ four");
    assert.ok(out.startsWith('<ul role="presentation"'), out);
    assert.equal(out.match(/<li /g)?.length, 4);
    assert.ok(out.includes(">three</li>"));
  });

  it("renders ordered lists", () => {
    const out = html("1. one\n2. two");
    assert.ok(out.startsWith('<ol role="presentation"'), out);
    assert.ok(out.endsWith(">two</li></ol>"), out);
  });

  it("renders caret lines as block quotes", () => {
    const out = html("^ inset text");
    assert.ok(out.startsWith("<blockquote style="), out);
    assert.ok(out.endsWith(`${P}inset text</p></blockquote>`), out);
  });

  it("renders thematic breaks", () => {
    assert.equal(
      html("a\n\n***\n\nb"),
      `${P}a</p>\n<hr style="border: 0; height: 1px; background: #BFC1C3; Margin: 30px 0 30px 0;" />\n${P}b</p>`,
    );
  });

  it("renders links and autolinks", () => {
    assert.equal(
      html("[Example](https://example.com)"),
      `${P}<a style="${LINK_STYLE}" target="_blank" href="https://example.com">Example</a></p>`,
    );
    assert.equal(
      html("Go to https://example.com/a."),
      `${P}Go to <a style="${LINK_STYLE}" target="_blank" href="https://example.com/a">https://example.com/a</a>.</p>`,
    );
  });

  it("does not relink existing anchors", () => {
    assert.equal(
      html('<a href="https://example.com">Example</a>'),
      `${P}<a href="https://example.com">Example</a></p>`,
    );
  });

  it("keeps placeholders inside link URLs", () => {
    assert.equal(
      html("[link](https://example.com/<span class='placeholder'>((id))</span>)"),
      `${P}<a style="${LINK_STYLE}" target="_blank" href="https://example.com/((id))">link</a></p>`,
    );
    assert.equal(
      html("[link](https://example.com/((id)))"),
      `${P}<a style="${LINK_STYLE}" target="_blank" href="https://example.com/((id))">link</a></p>`,
    );
  });

  it("renders action links", () => {
    const expected = `${P}<a href="https://example.com/book"><img alt="call to action img" src="https://assets.test/img/action-link.png" style="vertical-align: middle;"> <b>Book now</b></a></p>`;
    assert.equal(html(">>[Book now](https://example.com/book)"), expected);
    assert.equal(html("&gt;&gt;[Book now](https://example.com/book)"), expected);
  });

  it("renders emphasis and drops strikethrough and code markup", () => {
    assert.equal(
      html("**bold** and *em* and _em2_ first_name_here"),
      `${P}<strong>bold</strong> and <em>em</em> and <em>em2</em> first_name_here</p>`,
    );
    assert.equal(html("~~Strike~~ `code`"), `${P}Strike code</p>`);
  });

  it("removes images and tables", () => {
    assert.equal(html("![alt](https://example.com/x.png)"), "");
    assert.equal(html("a | b\n--- | ---\n1 | 2"), "");
  });
});

// ---------------------------------------------------------------------------
// Plain text
// ---------------------------------------------------------------------------

describe("plainTextEmailMarkdown", () => {
  const rule = "-".repeat(COLUMN_WIDTH);

  it("keeps paragraphs and line breaks", () => {
    assert.equal(
      plainTextEmailMarkdown("line one\nline two\n\nnew paragraph"),
      "line one\nline two\n\nnew paragraph",
    );
  });

  it("underlines headings", () => {
    assert.equal(plainTextEmailMarkdown("# heading\n\nbody"), `\nheading\n${rule}\n\nbody`);
    assert.equal(plainTextEmailMarkdown("## sub"), `sub\n${rule}`);
  });

  it("uses a bullet character for unordered lists", () => {
    assert.equal(plainTextEmailMarkdown("* one\n- two\n• three"), "• one\n• two\n• three");
    assert.equal(plainTextEmailMarkdown("1. one\n2. two"), "1. one\n2. two");
  });

  it("spells out links", () => {
    assert.equal(
      plainTextEmailMarkdown("[Example](https://example.com)"),
      "Example: https://example.com",
    );
    assert.equal(
      plainTextEmailMarkdown('[Example](https://example.com "Title")'),
      "Example (Title): https://example.com",
    );
    assert.equal(plainTextEmailMarkdown(">>[Book](https://x.test)"), "Book: https://x.test");
  });

  it("keeps emphasis markers", () => {
    assert.equal(plainTextEmailMarkdown("**important** and _note_"), "**important** and _note_");
  });

  it("renders breaks and quotes", () => {
    assert.equal(plainTextEmailMarkdown("***"), "=".repeat(COLUMN_WIDTH));
    assert.equal(plainTextEmailMarkdown("^ inset text"), "inset text");
  });
});

describe("preheaderMarkdown", () => {
  it("keeps words only", () => {
    assert.equal(
      preheaderMarkdown("# Title\n\nSee [the docs](https://x.test) and **this**\n\n* a\n* b"),
      "Title See the docs and this • a • b",
    );
  });
});
