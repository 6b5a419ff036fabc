import type { Result } from "../lib/result.js";
import { ANSI, colorize } from "../lib/terminal/ansi.js";
import { toDoctorError, type DoctorFailure } from "./errors.js";
import { itemSymbol, severityColor, type Severity } from "./severity.js";

export type Displayable = string | number | bigint | boolean | { toString(): string };

export class DoctorItem {
  readonly severity: Severity;
  readonly message: string;

  constructor(severity: Severity, message: Displayable) {
    this.severity = severity;
    this.message = String(message);
  }

  static victory(message: Displayable): DoctorItem {
    return new DoctorItem("victory", message);
  }

  static warning(message: Displayable): DoctorItem {
    return new DoctorItem("warning", message);
  }

  static failure(message: Displayable): DoctorItem {
    return new DoctorItem("error", message);
  }

  /**
   * Every check result goes through here. Success is always a victory and
   * failure always an error; warnings only come from a check's own logic.
   */
  static fromResult(result: Result<Displayable, DoctorFailure>): DoctorItem {
    if (result.ok) return DoctorItem.victory(result.value);
    return DoctorItem.failure(toDoctorError(result.error).message);
  }

  isWarning(): boolean {
    return this.severity === "warning";
  }

  isFailure(): boolean {
    return this.severity === "error";
  }

  bullet(): string {
    return `${itemSymbol(this.severity)} ${this.message}`;
  }

  // Styles one wrapped line of `bullet()`; `first` marks the line carrying the glyph.
  styleLine(line: string, opts: { color: boolean; first: boolean }): string {
    if (this.severity !== "victory") {
      return colorize({ enabled: opts.color, codes: [ANSI.bold, severityColor(this.severity)], s: line });
    }
    const symbol = itemSymbol(this.severity);
    if (!opts.first || !line.startsWith(symbol)) return line;
    return colorize({ enabled: opts.color, codes: [severityColor(this.severity)], s: symbol }) + line.slice(symbol.length);
  }
}
