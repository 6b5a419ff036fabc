import { describe, expect, it } from "vitest";
import { DoctorError } from "../src/doctor/errors.js";
import { DoctorItem } from "../src/doctor/item.js";
import { Section, reportSeverity } from "../src/doctor/section.js";
import { err } from "../src/lib/result.js";
import { RustVersion } from "../src/lib/toolchain/rust-version.js";

const plain = { width: 80, color: false };
const colored = { width: 80, color: true };

describe("section severity", () => {
  it("is error whenever any item failed", () => {
    const section = new Section("Mixed").addItems([
      DoctorItem.victory("a"),
      DoctorItem.warning("b"),
      DoctorItem.failure("c"),
      DoctorItem.victory("d"),
    ]);
    expect(section.hasError()).toBe(true);
    expect(section.severity()).toBe("error");
  });

  it("is warning when there are warnings but no errors", () => {
    const section = new Section("Warn").addItem(DoctorItem.victory("a")).addItem(DoctorItem.warning("b"));
    expect(section.hasError()).toBe(false);
    expect(section.hasWarning()).toBe(true);
    expect(section.severity()).toBe("warning");
  });

  it("is victory for only victories", () => {
    const section = new Section("Ok").addItems([DoctorItem.victory("a"), DoctorItem.victory("b")]);
    expect(section.severity()).toBe("victory");
  });

  it("is victory and empty with no items", () => {
    const section = new Section("Nothing");
    expect(section.isEmpty()).toBe(true);
    expect(section.severity()).toBe("victory");
  });

  it("folds sections into a report severity", () => {
    const ok = new Section("a").addItem(DoctorItem.victory("x"));
    const warn = new Section("b").addItem(DoctorItem.warning("y"));
    const fail = new Section("c").addItem(DoctorItem.failure("z"));
    expect(reportSeverity([])).toBe("victory");
    expect(reportSeverity([ok, warn])).toBe("warning");
    expect(reportSeverity([fail, ok, warn])).toBe("error");
  });
});

describe("section render", () => {
  it("renders a warning section with a checkmark title", () => {
    const section = new Section("Xcode")
      .addItem(DoctorItem.victory("Xcode 14.3 found"))
      .addItem(DoctorItem.warning("Command Line Tools path not set"));

    expect(section.severity()).toBe("warning");
    expect(section.render(colored).split("\n")).toEqual([
      "\x1b[1;93m[✔] Xcode\x1b[0m",
      "    \x1b[92m•\x1b[0m Xcode 14.3 found",
      "    \x1b[1;93m✗ Command Line Tools path not set\x1b[0m",
    ]);
  });

  it("renders an invalid rust version as an error section", () => {
    const version = new RustVersion({ triple: [1, 46, 0], hash: "04488afe3", date: "2020-08-24" });
    const item = DoctorItem.fromResult(err(new DoctorError({ kind: "rust-version-invalid", version })));
    const section = new Section("Rust toolchain").addItem(item);

    expect(section.severity()).toBe("error");
    expect(item.message).toContain("1.46.0");
    const lines = section.render({ width: 300, color: true }).split("\n");
    expect(lines[0]).toBe("\x1b[1;91m[!] Rust toolchain\x1b[0m");
    expect(lines[1]).toBe(
      "    \x1b[1;91m✗ iOS linking is broken on Rust versions later than 1.45.2 (d3fb005a3 2020-07-31) and earlier than 1.49.0-nightly (ffa2e7ae8 2020-10-24), but you're on 1.46.0 (04488afe3 2020-08-24)!\x1b[0m",
    );
    expect(lines[2]).toBe("      \x1b[1;91m    - Until you can move to Rust 1.49.0, do one of the following:\x1b[0m");
  });

  it("keeps insertion order", () => {
    const section = new Section("Order").addItems(["zeta", "alpha", "mid"].map((m) => DoctorItem.victory(m)));
    expect(section.render(plain)).toBe(["[✔] Order", "    • zeta", "    • alpha", "    • mid"].join("\n"));
  });

  it("wraps items with a hanging indent", () => {
    const section = new Section("Wrap").addItem(DoctorItem.warning("alpha beta gamma delta epsilon"));
    expect(section.render({ width: 20, color: false })).toBe(
      ["[✔] Wrap", "    ✗ alpha beta", "      gamma delta", "      epsilon"].join("\n"),
    );
  });

  it("wraps the title without indent", () => {
    const section = new Section("a rather long section title");
    expect(section.render({ width: 16, color: false })).toBe(["[✔] a rather", "long section", "title"].join("\n"));
  });

  it("renders identically twice", () => {
    const section = new Section("Twice").addItems([DoctorItem.victory("one"), DoctorItem.failure("two")]);
    expect(section.render(colored)).toBe(section.render(colored));
  });

  it("prints the rendered text with a newline", () => {
    const chunks: string[] = [];
    const out = {
      write(chunk: string) {
        chunks.push(chunk);
        return true;
      },
    };
    const section = new Section("Out").addItem(DoctorItem.victory("ok"));
    section.print(plain, out);
    expect(chunks).toEqual(["[✔] Out\n    • ok\n"]);
  });
});
