/**
 * Streaming CSV reader for recipient uploads.
 *
 * Comma separated, `"` quoted with `""` for a literal quote. Spaces after a
 * delimiter are skipped. `\n`, `\r\n` and `\r` end a record, a blank line is
 * an empty record, and a quoted field left open runs to the end of input.
 */

type State = "startRecord" | "startField" | "inField" | "quoted" | "quoteInQuoted";

function newlineLength(text: string, i: number): number {
  const c = text[i];
  if (c === "\r") return text[i + 1] === "\n" ? 2 : 1;
  return c === "\n" ? 1 : 0;
}

export function* readCsv(text: string): Generator<string[], void, undefined> {
  let record: string[] = [];
  let field = "";
  let state: State = "startRecord";
  let i = 0;

  const endField = () => {
    record.push(field);
    field = "";
  };

  while (i < text.length) {
    const c = text[i];
    const newline = newlineLength(text, i);

    switch (state) {
      case "startRecord":
        if (newline) {
          yield [];
          i += newline;
        } else {
          state = "startField";
        }
        continue;

      case "startField":
        if (c === " ") {
          i++;
          continue;
        }
        if (c === '"') {
          state = "quoted";
          i++;
          continue;
        }
        state = "inField";
        continue;

      case "inField":
      case "quoteInQuoted":
        if (c === ",") {
          endField();
          state = "startField";
          i++;
        } else if (newline) {
          endField();
          yield record;
          record = [];
          state = "startRecord";
          i += newline;
        } else if (state === "quoteInQuoted" && c === '"') {
          field += '"';
          state = "quoted";
          i++;
        } else {
          field += c;
          state = "inField";
          i++;
        }
        continue;

      case "quoted":
        if (c === '"') state = "quoteInQuoted";
        else field += c;
        i++;
        continue;
    }
  }

  if (state !== "startRecord") {
    endField();
    yield record;
  }
}
