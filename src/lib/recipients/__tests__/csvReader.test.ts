import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { readCsv } from "../csvReader";

function read(text: string): string[][] {
  return [...readCsv(text)];
}

describe("readCsv", () => {
  it("splits records and fields", () => {
    assert.deepEqual(read("a,b\n1,2"), [
      ["a", "b"],
      ["1", "2"],
    ]);
  });

  it("reads quoted fields with commas and escaped quotes", () => {
    assert.deepEqual(read('name,note\n"Smith, Jo","said ""hi"""'), [
      ["name", "note"],
      ["Smith, Jo", 'said "hi"'],
    ]);
  });

  it("accepts every newline style", () => {
    assert.deepEqual(read("a\r\nb\rc\nd"), [["a"], ["b"], ["c"], ["d"]]);
  });

  it("yields blank lines as empty records", () => {
    assert.deepEqual(read("a\n\nb"), [["a"], [], ["b"]]);
  });

  it("skips spaces after a delimiter", () => {
    assert.deepEqual(read("a,  b"), [["a", "b"]]);
  });

  it("keeps an empty last field", () => {
    assert.deepEqual(read("a,"), [["a", ""]]);
  });

  it("runs an unterminated quote to the end", () => {
    assert.deepEqual(read('"abc\ndef'), [["abc\ndef"]]);
  });

  it("reads nothing from empty input", () => {
    assert.deepEqual(read(""), []);
    assert.deepEqual(read("a\n"), [["a"]]);
  });
});
