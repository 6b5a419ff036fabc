import { describe, expect, it } from "vitest";
import { ANSI, colorize } from "../src/lib/terminal/ansi.js";
import { TextWrapper } from "../src/lib/terminal/text-wrap.js";

function texts(wrapper: TextWrapper, text: string): string[] {
  return wrapper.wrap(text).map((l) => l.indent + l.text);
}

describe("colorize", () => {
  it("wraps text in SGR codes", () => {
    expect(colorize({ enabled: true, codes: [ANSI.bold, ANSI.brightRed], s: "bad" })).toBe("\x1b[1;91mbad\x1b[0m");
  });

  it("leaves text alone when disabled or empty", () => {
    expect(colorize({ enabled: false, codes: [ANSI.bold], s: "x" })).toBe("x");
    expect(colorize({ enabled: true, codes: [], s: "x" })).toBe("x");
    expect(colorize({ enabled: true, codes: [ANSI.bold], s: "" })).toBe("");
  });
});

describe("TextWrapper", () => {
  it("packs words greedily", () => {
    expect(texts(new TextWrapper({ width: 10 }), "one two three four")).toEqual(["one two", "three four"]);
  });

  it("splits words longer than the width", () => {
    expect(texts(new TextWrapper({ width: 4 }), "abcdefghij")).toEqual(["abcd", "efgh", "ij"]);
  });

  it("never splits an astral character", () => {
    expect(texts(new TextWrapper({ width: 4 }), "📱📱📱📱📱")).toEqual(["📱📱📱📱", "📱"]);
    expect(texts(new TextWrapper({ width: 5 }), "📱📱 ab")).toEqual(["📱📱 ab"]);
  });

  it("applies the first and hanging indents", () => {
    const wrapper = new TextWrapper({ width: 80, initialIndent: "    ", subsequentIndent: "      " });
    expect(texts(wrapper, "a\n  b c")).toEqual(["    a", "        b c"]);
  });

  it("keeps paragraph leading whitespace on continuation lines", () => {
    const wrapper = new TextWrapper({ width: 12 });
    expect(wrapper.wrap("  aaa bbb ccc")).toEqual([
      { indent: "", text: "  aaa bbb" },
      { indent: "", text: "  ccc" },
    ]);
  });

  it("keeps blank paragraphs", () => {
    expect(new TextWrapper({ width: 20 }).wrap("a\n\nb").map((l) => l.text)).toEqual(["a", "", "b"]);
  });
});
