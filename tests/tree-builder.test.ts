import { describe, expect, it, vi } from "vitest";

import { tokenize } from "../src/internal/tokenizer/mod.js";
import {
  buildTreeFromMarkup,
  buildTreeFromTokens,
  normalizeTree,
  type TreeNode
} from "../src/internal/tree/mod.js";

function elementNames(nodes: readonly TreeNode[], into: string[] = []): string[] {
  for (const node of nodes) {
    if (node.kind === "element") {
      into.push(node.name);
      elementNames(node.children, into);
    }
  }
  return into;
}

function nestedMarkup(names: readonly string[], depth: number): string {
  if (depth === 0) {
    return "leaf";
  }

  return names
    .map((name) => `<${name}>${name}-${String(depth)}${nestedMarkup(names, depth - 1)}</${name}>`)
    .join("");
}

describe("buildTreeFromTokens", () => {
  it("builds nested elements under the document root", () => {
    const built = buildTreeFromTokens(tokenize("<a><b>hi</b></a>").tokens);

    expect(built.document.name).toBe("document");
    expect(normalizeTree(built.document)).toBe([
      "| <a>",
      "|   <b>",
      "|     \"hi\""
    ].join("\n"));
    expect(built.errors).toEqual([]);
    expect(built.openElements).toEqual([]);
  });

  it("returns a childless root for no tokens", () => {
    const built = buildTreeFromTokens([]);

    expect(built.document).toEqual({ kind: "element", name: "document", children: [] });
  });

  it("puts plain text directly under the root", () => {
    const built = buildTreeFromTokens([{ type: "Text", content: "plain text" }]);

    expect(built.document.children).toEqual([{ kind: "text", value: "plain text" }]);
  });

  it("ignores an end tag with no matching open element", () => {
    const built = buildTreeFromMarkup("<a></b>");

    expect(normalizeTree(built.document)).toBe("| <a>");
    expect(built.errors).toEqual([{ code: "unbalanced-close", tokenIndex: 1 }]);
    expect(built.openElements.map((element) => element.name)).toEqual(["a"]);
  });

  it("closes inner elements implicitly when an outer end tag matches", () => {
    const built = buildTreeFromMarkup("<a><b></a>x");

    expect(normalizeTree(built.document)).toBe([
      "| <a>",
      "|   <b>",
      "| \"x\""
    ].join("\n"));
    expect(built.errors).toEqual([{ code: "misnested-close", tokenIndex: 2 }]);
    expect(built.openElements).toEqual([]);
  });

  it("closes the innermost element with a matching name", () => {
    const built = buildTreeFromMarkup("<a><a>x</a>y");

    expect(normalizeTree(built.document)).toBe([
      "| <a>",
      "|   <a>",
      "|     \"x\"",
      "|   \"y\""
    ].join("\n"));
    expect(built.openElements).toHaveLength(1);
    expect(built.openElements[0]).toBe(built.document.children[0]);
  });

  it("matches end tag names case-sensitively", () => {
    const built = buildTreeFromMarkup("<A>x</a>");

    expect(built.errors).toEqual([{ code: "unbalanced-close", tokenIndex: 2 }]);
    expect(built.openElements.map((element) => element.name)).toEqual(["A"]);
  });

  it("never pops the root however many end tags arrive", () => {
    const built = buildTreeFromMarkup("</a></a></document>text");

    expect(built.document.name).toBe("document");
    expect(built.document.children).toEqual([{ kind: "text", value: "text" }]);
    expect(built.errors.map((error) => error.code)).toEqual([
      "unbalanced-close",
      "unbalanced-close",
      "unbalanced-close"
    ]);
  });

  it("treats an element named document like any other element", () => {
    const built = buildTreeFromMarkup("<document>x</document></document>");

    expect(normalizeTree(built.document)).toBe([
      "| <document>",
      "|   \"x\""
    ].join("\n"));
    expect(built.errors).toEqual([{ code: "unbalanced-close", tokenIndex: 3 }]);
  });

  it("leaves elements open at end of input with the children they received", () => {
    const built = buildTreeFromMarkup("<a><b>text");

    expect(normalizeTree(built.document)).toBe([
      "| <a>",
      "|   <b>",
      "|     \"text\""
    ].join("\n"));
    expect(built.openElements.map((element) => element.name)).toEqual(["a", "b"]);
  });

  it("keeps element order for well-formed input", () => {
    const names = ["p", "q", "r"];
    const built = buildTreeFromMarkup(nestedMarkup(names, 3));

    const expected: string[] = [];
    for (const match of nestedMarkup(names, 3).matchAll(/<([a-z])>/g)) {
      expected.push(match[1] ?? "");
    }

    expect(elementNames(built.document.children)).toEqual(expected);
    expect(built.errors).toEqual([]);
    expect(built.openElements).toEqual([]);
  });

  it("handles nesting deeper than any fixed stack", () => {
    const built = buildTreeFromMarkup("<d>".repeat(10_000));

    expect(built.openElements).toHaveLength(10_000);
    expect(built.errors).toEqual([]);
  });

  it("computes element spans from start tag to end tag", () => {
    const built = buildTreeFromMarkup("<a><b>x</a>", undefined, { captureSpans: true });

    expect(built.document.children).toEqual([
      {
        kind: "element",
        name: "a",
        span: { start: 0, end: 11 },
        children: [
          {
            kind: "element",
            name: "b",
            span: { start: 3, end: 7 },
            children: [{ kind: "text", value: "x", span: { start: 6, end: 7 } }]
          }
        ]
      }
    ]);
    expect(built.errors).toEqual([{ code: "misnested-close", tokenIndex: 3, startOffset: 7, endOffset: 11 }]);
  });

  it("ends an unclosed element span at the last token", () => {
    const built = buildTreeFromMarkup("<a>xy", undefined, { captureSpans: true });

    expect(built.openElements[0]?.span).toEqual({ start: 0, end: 5 });
  });

  it("reports a soft depth budget once", () => {
    const built = buildTreeFromMarkup("<a><b><c><d></d></c></b></a>", { maxDepth: 2 });

    expect(built.errors).toEqual([{ code: "max-depth-exceeded", tokenIndex: 2 }]);
  });

  it("reports a soft node budget once", () => {
    const built = buildTreeFromMarkup("<a>x</a><b></b>", { maxNodes: 1 });

    expect(built.errors).toEqual([{ code: "max-nodes-exceeded", tokenIndex: 1 }]);
    expect(normalizeTree(built.document)).toBe([
      "| <a>",
      "|   \"x\"",
      "| <b>"
    ].join("\n"));
  });

  it("forwards builder and tokenizer diagnostics to callbacks", () => {
    const onParseError = vi.fn();
    const onTokenizerError = vi.fn();
    const built = buildTreeFromMarkup("</x><y", undefined, { onParseError, onTokenizerError });

    expect(onParseError).toHaveBeenCalledWith({ code: "unbalanced-close", tokenIndex: 0 });
    expect(onTokenizerError).toHaveBeenCalledWith({ code: "unterminated-tag", index: 4 });
    expect(built.tokenizerErrors).toEqual([{ code: "unterminated-tag", index: 4 }]);
    expect(built.tokenCount).toBe(2);
    expect(built.openElements.map((element) => element.name)).toEqual(["y"]);
  });
});
