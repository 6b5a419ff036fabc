import { ANSI, type AnsiCode } from "../lib/terminal/ansi.js";

export const SEVERITIES = ["victory", "warning", "error"] as const;
export type Severity = (typeof SEVERITIES)[number];

const SEVERITY_RANK: Record<Severity, number> = { victory: 0, warning: 1, error: 2 };

const SEVERITY_COLOR: Record<Severity, AnsiCode> = {
  victory: ANSI.brightGreen,
  warning: ANSI.brightYellow,
  error: ANSI.brightRed,
};

export function severityRank(severity: Severity): number {
  return SEVERITY_RANK[severity];
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[b] > SEVERITY_RANK[a] ? b : a;
}

// Warnings keep the checkmark at section level; only a hard error flips it.
export function titleSymbol(severity: Severity): string {
  return severity === "error" ? "!" : "✔";
}

export function itemSymbol(severity: Severity): string {
  return severity === "victory" ? "•" : "✗";
}

export function severityColor(severity: Severity): AnsiCode {
  return SEVERITY_COLOR[severity];
}
