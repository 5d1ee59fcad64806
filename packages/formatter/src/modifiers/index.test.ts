import { describe, expect, it } from "vitest";
import type { ModifierSpec } from "@loctext/contracts";
import { CollectingDiagnosticsSink } from "@loctext/shared";
import { humanizeBytes, ModifierEngine } from "./index.js";

function named(name: string, ...args: string[]): ModifierSpec {
  const source = args.length > 0 ? `${name}(${args.join(",")})` : name;
  return { kind: "named", name, args, source };
}

function printf(spec: string): ModifierSpec {
  return { kind: "printf", spec };
}

describe("humanizeBytes", () => {
  it("picks the unit keeping the number below 1024", () => {
    expect(humanizeBytes(0)).toBe("0 B");
    expect(humanizeBytes(1023)).toBe("1023 B");
    expect(humanizeBytes(1024)).toBe("1.0 KB");
    expect(humanizeBytes(1_572_864)).toBe("1.5 MB");
    expect(humanizeBytes(5 * 1024 ** 3)).toBe("5.0 GB");
  });

  it("moves up a unit when rounding would show 1024", () => {
    expect(humanizeBytes(1_048_575)).toBe("1.0 MB");
  });
});

describe("ModifierEngine", () => {
  it("passes the value through an empty chain", () => {
    const engine = new ModifierEngine();

    expect(engine.apply(42, [], "{x}")).toBe(42);
  });

  it("formats with printf specs", () => {
    const engine = new ModifierEngine();

    expect(engine.apply(3.14157, [printf("%.2f")], "")).toBe("3.14");
    expect(engine.apply("12.7", [printf("%d")], "")).toBe("12");
    expect(engine.apply("ab", [printf("%-6s")], "")).toBe("ab    ");
    expect(engine.apply(42, [printf("%05d")], "")).toBe("00042");
  });

  it("warns and keeps the value when printf rejects it", () => {
    const diagnostics = new CollectingDiagnosticsSink();
    const engine = new ModifierEngine({ diagnostics });

    expect(engine.apply("abc", [printf("%d")], "{n %d}")).toBe("abc");
    expect(diagnostics.warnings).toHaveLength(1);
    expect(diagnostics.warnings[0]).toMatchObject({
      type: "modifier_failed",
      modifier: "%d",
      value: "abc",
    });
  });

  it("humanizes byte counts given as string", () => {
    const engine = new ModifierEngine();

    expect(engine.apply("1572864", [named("BYTES")], "")).toBe("1.5 MB");
  });

  it("renders year, date and time", () => {
    const engine = new ModifierEngine();

    expect(engine.apply("2017-06-26", [named("YEAR")], "")).toBe("2017");
    expect(engine.apply("2018", [named("YEAR")], "")).toBe("2018");
    expect(engine.apply(2017, [named("YEAR")], "")).toBe("2017");
    expect(engine.apply(1498429696, [named("YEAR")], "")).toBe("2017");
    expect(engine.apply("2017-06-26 00:24:15", [named("DATE")], "")).toBe(
      "2017-06-26",
    );
    expect(engine.apply("2017-06-26 00:24:15", [named("TIME")], "")).toBe(
      "00:24:15",
    );
  });

  it("renders DT keywords from epoch seconds", () => {
    const engine = new ModifierEngine();

    expect(engine.apply(1498429696, [named("DT", "ASC")], "")).toBe(
      "Sun Jun 25 22:28:16 2017",
    );
    expect(engine.apply(1498429696, [named("DT", "ISO")], "")).toBe(
      "2017-06-25T22:28:16Z",
    );
    expect(engine.apply(1498429696, [named("DT")], "")).toBe(
      "2017-06-25 22:28:16",
    );
  });

  it("uses the configured time zone", () => {
    const engine = new ModifierEngine({ timeZone: "Europe/Amsterdam" });

    expect(engine.apply(1498429696, [named("TIME")], "")).toBe("00:28:16");
  });

  it("falls back to FT for an unknown DT keyword", () => {
    const diagnostics = new CollectingDiagnosticsSink();
    const engine = new ModifierEngine({ diagnostics });

    expect(engine.apply(1498429696, [named("DT", "NOPE")], "{t DT(NOPE)}")).toBe(
      "2017-06-25 22:28:16",
    );
    expect(diagnostics.warnings).toEqual([
      { type: "unknown_modifier", modifier: "DT(NOPE)", format: "{t DT(NOPE)}" },
    ]);
  });

  it("keeps unreadable dates and warns", () => {
    const diagnostics = new CollectingDiagnosticsSink();
    const engine = new ModifierEngine({ diagnostics });

    expect(engine.apply("someday", [named("DATE")], "")).toBe("someday");
    expect(diagnostics.warnings[0]).toMatchObject({
      type: "modifier_failed",
      modifier: "DATE",
      value: "someday",
    });
  });

  it("chains custom modifiers after built-ins", () => {
    const engine = new ModifierEngine({
      custom: {
        EUR: (value) => `€ ${String(value)}`,
        BYTES: () => "custom",
      },
    });

    expect(engine.apply(3.5, [printf("%.2f"), named("EUR")], "")).toBe("€ 3.50");
    expect(engine.apply(1024, [named("BYTES")], "")).toBe("1.0 KB");
  });

  it("passes arguments to custom modifiers", () => {
    const engine = new ModifierEngine({
      custom: {
        WRAP: (value, args) => `${args[0] ?? ""}${String(value)}${args[1] ?? ""}`,
      },
    });

    expect(engine.apply("x", [named("WRAP", "[", "]")], "")).toBe("[x]");
  });

  it("warns about unknown modifiers and passes the value on", () => {
    const diagnostics = new CollectingDiagnosticsSink();
    const engine = new ModifierEngine({ diagnostics });

    expect(engine.apply("v", [named("SHOUT")], "{x SHOUT}")).toBe("v");
    expect(diagnostics.warnings).toEqual([
      { type: "unknown_modifier", modifier: "SHOUT", format: "{x SHOUT}" },
    ]);
  });
});
