import { describe, expect, it } from "vitest";
import { InMemoryMessageResolver } from "./in-memory-message-resolver.js";
import {
  createMessageAccessor,
  substitutePlaceholders,
} from "./message-accessor.js";

const resolver = new InMemoryMessageResolver({
  "ResultTable.saved": "Changes stored",
  "ResultTable.count": "{0} of {1} rows stored",
  "ResultTable.repeat": "{0}, {0}!",
});

describe("createMessageAccessor", () => {
  const Messages = createMessageAccessor(resolver);

  it("getString delegates to the resolver", () => {
    expect(Messages.getString("ResultTable.saved")).toBe("Changes stored");
    expect(Messages.getString("ResultTable.gone")).toBe("!ResultTable.gone!");
  });

  it("format substitutes positional arguments", () => {
    expect(Messages.format("ResultTable.count", 3, 10)).toBe(
      "3 of 10 rows stored",
    );
    expect(Messages.format("ResultTable.repeat", "Hey")).toBe("Hey, Hey!");
  });

  it("format leaves placeholders without an argument in place", () => {
    expect(Messages.format("ResultTable.count", 3)).toBe("3 of {1} rows stored");
  });

  it("format returns the missing marker untouched", () => {
    expect(Messages.format("ResultTable.gone", 1)).toBe("!ResultTable.gone!");
  });

  it("format echoes the key in show-keys mode", () => {
    const debugMessages = createMessageAccessor(
      new InMemoryMessageResolver({}, { showMessageKeys: true }),
    );

    expect(debugMessages.format("ResultTable.count", 1, 2)).toBe(
      "ResultTable.count",
    );
  });
});

describe("substitutePlaceholders", () => {
  it("stringifies non-string arguments", () => {
    expect(substitutePlaceholders("{0}/{1}", [true, 12n])).toBe("true/12");
  });
});
