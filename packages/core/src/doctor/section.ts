import { ANSI, colorize } from "../lib/terminal/ansi.js";
import { TextWrapper } from "../lib/terminal/text-wrap.js";
import type { DoctorItem } from "./item.js";
import { maxSeverity, severityColor, titleSymbol, type Severity } from "./severity.js";
import type { RenderConfig } from "./types.js";

const BULLET_INDENT = "    ";
// Two extra columns line continuation text up under the message, not the glyph.
const HANGING_INDENT = "      ";

export class Section {
  readonly title: string;
  private readonly items: DoctorItem[] = [];

  constructor(title: string) {
    this.title = title;
  }

  addItem(item: DoctorItem): this {
    this.items.push(item);
    return this;
  }

  addItems(items: Iterable<DoctorItem>): this {
    for (const item of items) this.items.push(item);
    return this;
  }

  getItems(): readonly DoctorItem[] {
    return this.items;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  hasError(): boolean {
    return this.items.some((item) => item.isFailure());
  }

  hasWarning(): boolean {
    return this.items.some((item) => item.isWarning());
  }

  severity(): Severity {
    if (this.hasError()) return "error";
    if (this.hasWarning()) return "warning";
    return "victory";
  }

  render(config: RenderConfig): string {
    const wrapper = new TextWrapper({ width: config.width });
    const bulletWrapper = wrapper.withIndents(BULLET_INDENT, HANGING_INDENT);
    const severity = this.severity();

    const lines = wrapper
      .wrap(`[${titleSymbol(severity)}] ${this.title}`)
      .map((l) => l.indent + colorize({ enabled: config.color, codes: [ANSI.bold, severityColor(severity)], s: l.text }));

    for (const item of this.items) {
      bulletWrapper.wrap(item.bullet()).forEach((l, i) => {
        lines.push(l.indent + item.styleLine(l.text, { color: config.color, first: i === 0 }));
      });
    }
    return lines.map((l) => l.trimEnd()).join("\n");
  }

  print(config: RenderConfig, out: { write(chunk: string): unknown } = process.stdout): void {
    out.write(`${this.render(config)}\n`);
  }
}

export function reportSeverity(sections: Iterable<Section>): Severity {
  let worst: Severity = "victory";
  for (const section of sections) worst = maxSeverity(worst, section.severity());
  return worst;
}
