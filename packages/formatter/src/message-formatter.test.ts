import { describe, expect, it } from "vitest";
import type { TranslationRequest, Translator } from "@loctext/contracts";
import {
  CollectingDiagnosticsSink,
  MissingCountError,
  SuperfluousParametersError,
  UnexpectedCountError,
} from "@loctext/shared";
import {
  createTranslationFilterFactory,
  createTranslationFunction,
  type CallBinding,
} from "./call-shapes.js";
import { MessageFormatter, selectByDefaultPluralRule } from "./message-formatter.js";
import { createObjectScope } from "./resolver.js";

function setup(
  options: ConstructorParameters<typeof MessageFormatter>[0] = {},
  binding: Partial<CallBinding> = {},
) {
  const diagnostics = new CollectingDiagnosticsSink();
  const formatter = new MessageFormatter({ diagnostics, ...options });
  const fullBinding: CallBinding = {
    domain: "site",
    html: formatter.html,
    env: {},
    ...binding,
  };

  return {
    diagnostics,
    formatter,
    loc: createTranslationFunction(formatter, fullBinding),
    filter: createTranslationFilterFactory(formatter, fullBinding),
  };
}

class RecordingTranslator implements Translator {
  readonly requests: TranslationRequest[] = [];

  constructor(private readonly table: Record<string, Record<string, [string, string?]>>) {}

  translate(request: TranslationRequest): string | undefined {
    this.requests.push(request);
    const forms = this.table[request.lang ?? ""]?.[request.msgid];
    if (!forms) return undefined;
    const [singular, plural] = forms;
    return request.count === undefined || request.count === 1 || plural === undefined
      ? singular
      : plural;
  }
}

describe("selectByDefaultPluralRule", () => {
  it("picks singular only for a count of one", () => {
    expect(selectByDefaultPluralRule("one", "many", 1)).toBe("one");
    expect(selectByDefaultPluralRule("one", "many", 0)).toBe("many");
    expect(selectByDefaultPluralRule("one", "many", 5)).toBe("many");
    expect(selectByDefaultPluralRule("only", undefined, undefined)).toBe("only");
  });
});

describe("function call shape", () => {
  it("fills named parameters", () => {
    const { loc } = setup();

    expect(loc("Hi {name}", { name: "World" })).toBe("Hi World");
  });

  it("falls back to the ambient scope", () => {
    const { loc } = setup({}, { env: { scope: createObjectScope({ name: "Ctx" }) } });

    expect(loc("Hi {name}")).toBe("Hi Ctx");
  });

  it("renders an empty value and warns when nothing provides the key", () => {
    const { loc, diagnostics } = setup(
      {},
      { env: { scope: createObjectScope({}, "welcome.tt") } },
    );

    expect(loc("Hi {name}")).toBe("Hi ");
    expect(diagnostics.warnings).toEqual([
      { type: "missing_key", key: "name", format: "Hi {name}", target: "welcome.tt" },
    ]);
  });

  it("uses defaults", () => {
    const { loc } = setup();

    expect(loc("{count//0}")).toBe("0");
  });

  it("shows a quoted default as is and runs a bare one through modifiers", () => {
    const { loc, diagnostics } = setup();

    expect(loc("{date DT//'not yet'}", { date: "" })).toBe("not yet");
    expect(loc("{year//2017 YEAR}")).toBe("2017");
    expect(diagnostics.warnings).toEqual([]);
  });

  it("refuses a count that is not a number", () => {
    const { loc } = setup();

    expect(() => loc("a|{_count} b", "abc")).toThrow(MissingCountError);
    expect(() => loc("a|{_count} b", { _count: Number.NaN })).toThrow(MissingCountError);
  });

  it("selects singular or plural from a positional count", () => {
    const { loc } = setup();

    expect(loc("one item|{_count} items", 1)).toBe("one item");
    expect(loc("one item|{_count} items", 5)).toBe("5 items");
  });

  it("takes the count from _count", () => {
    const { loc } = setup();

    expect(loc("one item|{_count} items", { _count: 0 })).toBe("0 items");
  });

  it("counts arrays by their length", () => {
    const { loc } = setup();

    expect(loc("one file|{_count} files", ["a.txt", "b.txt"])).toBe("2 files");
  });

  it("rejects a plural msgid without count", () => {
    const { loc } = setup();

    expect(() => loc("one item|{_count} items")).toThrow(MissingCountError);
    expect(() => loc("one item|{_count} items", { other: 1 })).toThrow(
      MissingCountError,
    );
  });

  it("rejects a count for a msgid without plural", () => {
    const { loc } = setup();

    expect(() => loc("Hello", { _count: 3 })).toThrow(UnexpectedCountError);
  });

  it("rejects superfluous positionals", () => {
    const { loc } = setup();

    expect(() => loc("Hello", 3)).toThrow(SuperfluousParametersError);
    expect(() => loc("one|{_count} more", 1, 2)).toThrow(SuperfluousParametersError);
    expect(() => loc("one|{_count} more", 2, { _count: 2 })).toThrow(
      SuperfluousParametersError,
    );
  });

  it("applies modifiers", () => {
    const { loc } = setup();

    expect(loc("π = {pi %.2f}", { pi: 3.14157 })).toBe("π = 3.14");
    expect(loc("downloaded {size BYTES}", { size: 1_572_864 })).toBe(
      "downloaded 1.5 MB",
    );
    expect(loc("copyright: {year//2017 YEAR}", { year: "" })).toBe("copyright: 2017");
  });

  it("uses custom modifiers", () => {
    const { loc } = setup({ modifiers: { EUR: (value) => `€${String(value)}` } });

    expect(loc("price: {price %.2f EUR}", { price: 5 })).toBe("price: €5.00");
  });
});

describe("html escaping", () => {
  it("escapes substituted values but not literal text", () => {
    const { loc } = setup({ templateSyntax: "HTML" });

    expect(loc("<b>{name}</b>", { name: "Tom & <Jerry>" })).toBe(
      "<b>Tom &amp; &lt;Jerry&gt;</b>",
    );
  });

  it("leaves values under the _html suffix alone", () => {
    const { loc } = setup({ templateSyntax: "HTML" });

    expect(loc("see {link_html}", { link_html: '<a href="/">home</a>' })).toBe(
      'see <a href="/">home</a>',
    );
  });

  it("does not escape in text mode", () => {
    const { loc } = setup({ templateSyntax: "TEXT" });

    expect(loc("{name}", { name: "<Jerry>" })).toBe("<Jerry>");
  });
});

describe("translation", () => {
  it("formats the translated template in the caller's language", () => {
    const translator = new RecordingTranslator({
      nl: {
        "Hi {name}": ["Hallo {name}"],
        "one item": ["één ding", "{_count} dingen"],
      },
    });
    const { loc } = setup({ translator }, { env: { lang: "nl" }, defaultLang: "en" });

    expect(loc("Hi {name}", { name: "Ann" })).toBe("Hallo Ann");
    expect(loc("one item|{_count} items", 3)).toBe("3 dingen");
    expect(translator.requests[1]).toEqual({
      domain: "site",
      msgid: "one item",
      plural: "{_count} items",
      count: 3,
      lang: "nl",
    });
  });

  it("uses the domain default language when the render has none", () => {
    const translator = new RecordingTranslator({});
    const { loc } = setup({ translator }, { defaultLang: "de" });

    expect(loc("Hello")).toBe("Hello");
    expect(translator.requests[0]?.lang).toBe("de");
  });

  it("forwards the translation context", () => {
    const translator = new RecordingTranslator({});
    const { loc } = setup({ translator });

    loc("{name} forgot a key", { name: "Sam", _context: { gender: "female" } });

    expect(translator.requests[0]?.context).toEqual({ gender: "female" });
  });

  it("can replace expansion with a custom format function", () => {
    const { loc } = setup({
      formatWith: (format, call) => `[${format}:${String(call.params.name)}]`,
    });

    expect(loc("Hi {name}", { name: "Ann" })).toBe("[Hi {name}:Ann]");
  });
});

describe("filter call shape", () => {
  it("binds parameters before receiving the body", () => {
    const { filter } = setup();
    const bound = filter({ n: "Ann" });

    expect(bound.apply("hi {n}")).toBe("hi Ann");
  });

  it("produces the same output as the function shape", () => {
    const { filter, loc } = setup();

    expect(filter({ _count: 4 }).apply("one file|{_count} files")).toBe(
      loc("one file|{_count} files", 4),
    );
  });

  it("validates counts like the function shape", () => {
    const { filter } = setup();

    expect(() => filter().apply("one|{_count} more")).toThrow(MissingCountError);
    expect(() => filter({ _count: 1 }).apply("just one")).toThrow(
      UnexpectedCountError,
    );
  });
});
