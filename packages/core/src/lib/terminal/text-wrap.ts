export type WrappedLine = {
  indent: string;
  text: string;
};

function codePointLength(s: string): number {
  return Array.from(s).length;
}

export type TextWrapperOpts = {
  width: number;
  initialIndent?: string;
  subsequentIndent?: string;
};

/**
 * Greedy word wrapper for plain text.
 *
 * Explicit newlines start a new paragraph. A paragraph's leading whitespace is
 * kept on each of its lines after the indent, so nested remediation steps stay
 * aligned. Words longer than the available width are split.
 */
export class TextWrapper {
  readonly width: number;
  readonly initialIndent: string;
  readonly subsequentIndent: string;

  constructor(opts: TextWrapperOpts) {
    this.width = Math.max(1, Math.trunc(opts.width));
    this.initialIndent = opts.initialIndent ?? "";
    this.subsequentIndent = opts.subsequentIndent ?? "";
  }

  withIndents(initialIndent: string, subsequentIndent: string): TextWrapper {
    return new TextWrapper({ width: this.width, initialIndent, subsequentIndent });
  }

  wrap(text: string): WrappedLine[] {
    const out: WrappedLine[] = [];
    const nextIndent = () => (out.length === 0 ? this.initialIndent : this.subsequentIndent);

    for (const paragraph of text.replace(/\r\n/g, "\n").split("\n")) {
      const lead = /^[ \t]*/.exec(paragraph)?.[0] ?? "";
      const words = paragraph.slice(lead.length).split(/\s+/).filter(Boolean);
      if (words.length === 0) {
        out.push({ indent: nextIndent(), text: "" });
        continue;
      }

      let indent = nextIndent();
      let available = Math.max(1, this.width - indent.length - lead.length);
      let line = "";
      const flush = () => {
        out.push({ indent, text: lead + line });
        line = "";
        indent = nextIndent();
        available = Math.max(1, this.width - indent.length - lead.length);
      };

      for (const word of words) {
        if (line && codePointLength(line) + 1 + codePointLength(word) <= available) {
          line += ` ${word}`;
          continue;
        }
        if (line) flush();
        // Split by code point so astral characters stay whole.
        let rest = Array.from(word);
        while (rest.length > available) {
          line = rest.slice(0, available).join("");
          rest = rest.slice(available);
          flush();
        }
        line = rest.join("");
      }
      flush();
    }
    return out;
  }
}
