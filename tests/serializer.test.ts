import { describe, expect, it } from "vitest";

import { serializeTokens } from "../src/internal/serializer/serialize.js";
import { tokenize } from "../src/internal/tokenizer/mod.js";

describe("serializeTokens", () => {
  it("reproduces input whose tags are all terminated", () => {
    const inputs = [
      "<a><b>hi</b></a>",
      "plain text",
      "  \n<p>\t</p>  ",
      "<x y='1'>a & b</x>",
      "a<>b</>c",
      "</stray><open>"
    ];

    for (const input of inputs) {
      expect(serializeTokens(tokenize(input).tokens)).toBe(input);
    }
  });

  it("closes an unterminated tag", () => {
    expect(serializeTokens(tokenize("text<a").tokens)).toBe("text<a>");
  });

  it("writes text verbatim", () => {
    expect(serializeTokens([
      { type: "StartTag", name: "q" },
      { type: "Text", content: "1 < 2 &amp; 3" },
      { type: "EndTag", name: "q" }
    ])).toBe("<q>1 < 2 &amp; 3</q>");
  });
});
