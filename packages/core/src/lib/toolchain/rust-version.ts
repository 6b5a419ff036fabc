export type VersionTriple = readonly [major: number, minor: number, patch: number];

export type RustChannel = "stable" | "beta" | "nightly";

// `rustc 1.46.0 (04488afe3 2020-08-24)`, `rustc 1.49.0-nightly (ffa2e7ae8 2020-10-24)`
export const RUSTC_VERSION_RE =
  /rustc\s+(\d+)\.(\d+)\.(\d+)(?:-(beta|nightly)(?:\.(\d+))?)?\s+\(([0-9a-f]+)\s+(\d{4}-\d{2}-\d{2})\)/;

export class RustVersion {
  readonly triple: VersionTriple;
  readonly channel: RustChannel;
  readonly channelBuild: number | null;
  readonly hash: string;
  readonly date: string;

  constructor(params: { triple: VersionTriple; channel?: RustChannel; channelBuild?: number | null; hash: string; date: string }) {
    this.triple = params.triple;
    this.channel = params.channel ?? "stable";
    this.channelBuild = params.channelBuild ?? null;
    this.hash = params.hash;
    this.date = params.date;
  }

  static fromMatch(match: RegExpExecArray): RustVersion {
    const [, major = "0", minor = "0", patch = "0", channel, build, hash = "", date = ""] = match;
    return new RustVersion({
      triple: [Number(major), Number(minor), Number(patch)],
      channel: channel === "beta" || channel === "nightly" ? channel : "stable",
      channelBuild: build ? Number(build) : null,
      hash,
      date,
    });
  }

  toString(): string {
    const suffix = this.channel === "stable" ? "" : `-${this.channel}${this.channelBuild == null ? "" : `.${this.channelBuild}`}`;
    return `${this.triple.join(".")}${suffix} (${this.hash} ${this.date})`;
  }
}

export function compareTriples(a: VersionTriple, b: VersionTriple): number {
  for (let i = 0; i < 3; i += 1) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    if (d !== 0) return d;
  }
  return 0;
}

const LAST_GOOD_IOS_LINKING: VersionTriple = [1, 45, 2];
const FIXED_IOS_LINKING: VersionTriple = [1, 49, 0];
const FIXED_IOS_LINKING_NIGHTLY_DATE = "2020-10-24";

// iOS linking broke after 1.45.2 and was fixed in 1.49.0-nightly (2020-10-24).
export function isRustVersionValidForIos(version: RustVersion): boolean {
  if (compareTriples(version.triple, LAST_GOOD_IOS_LINKING) <= 0) return true;
  const cmp = compareTriples(version.triple, FIXED_IOS_LINKING);
  if (cmp > 0) return true;
  if (cmp < 0) return false;
  if (version.channel !== "nightly") return true;
  return version.date >= FIXED_IOS_LINKING_NIGHTLY_DATE;
}
