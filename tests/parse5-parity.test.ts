import { parseFragment } from "parse5";
import { describe, expect, it } from "vitest";

import { parse, walk } from "../src/public/index.js";

interface OutlineSource {
  readonly nodeName: string;
  readonly tagName?: string;
  readonly value?: string;
  readonly childNodes?: readonly OutlineSource[];
}

function outlineReference(nodes: readonly OutlineSource[], depth: number, lines: string[]): string[] {
  for (const node of nodes) {
    const indent = "  ".repeat(depth);
    if (node.tagName !== undefined) {
      lines.push(`${indent}<${node.tagName}>`);
      outlineReference(node.childNodes ?? [], depth + 1, lines);
    } else if (node.nodeName === "#text") {
      lines.push(`${indent}"${node.value ?? ""}"`);
    }
  }
  return lines;
}

function outline(input: string): string[] {
  const lines: string[] = [];
  walk(parse(input), (node, depth) => {
    const indent = "  ".repeat(depth);
    lines.push(node.kind === "element" ? `${indent}<${node.tagName}>` : `${indent}"${node.value}"`);
  });
  return lines;
}

describe("parity with an HTML tree builder on well-formed input", () => {
  const inputs = [
    "<div><span>hi</span><em>a<b>b</b></em></div>",
    "<section><p>one</p><p>two</p></section>",
    "<ul><li>x</li><li>y <i>z</i></li></ul>",
    "text <strong>bold</strong> tail"
  ];

  for (const input of inputs) {
    it(`matches the reference outline for ${input}`, () => {
      const reference = outlineReference(parseFragment(input).childNodes, 0, []);

      expect(outline(input)).toEqual(reference);
    });
  }
});
