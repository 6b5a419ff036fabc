export const ANSI = {
  bold: 1,
  brightRed: 91,
  brightGreen: 92,
  brightYellow: 93,
} as const;

export type AnsiCode = (typeof ANSI)[keyof typeof ANSI];

export function colorize(params: { enabled: boolean; codes: readonly AnsiCode[]; s: string }): string {
  if (!params.enabled || params.codes.length === 0 || params.s === "") return params.s;
  return `\x1b[${params.codes.join(";")}m${params.s}\x1b[0m`;
}
