import { describe, it, expect } from "vitest";
import { buildRegistry } from "../../compiler";
import { XSD } from "../../constants/vocabularies";
import { defaultConfig } from "../../stores/compilerConfigStore";
import { StructuralError } from "../../types/errors";
import { resolveIri, resolveTerm, shortLocalName, toPrefixed } from "../../utils/termUtils";
import { BF, NS } from "../fixtures/vocabFixtures";

const registry = buildRegistry(defaultConfig);

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof StructuralError) return err.code;
    throw err;
  }
  return undefined;
}

describe("resolveTerm", () => {
  it("expands prefixed names against the registry", () => {
    const term = resolveTerm("ex:Work", registry);
    expect(term.termType).toBe("NamedNode");
    expect(term.value).toBe(`${NS}Work`);
    expect(resolveTerm("bf:Instance", registry).value).toBe(`${BF}Instance`);
  });

  it("passes absolute and bracketed IRIs through", () => {
    expect(resolveTerm("https://example.net/x", registry).value).toBe("https://example.net/x");
    expect(resolveTerm("<http://example.net/y>", registry).value).toBe("http://example.net/y");
  });

  it("reads N3 literals", () => {
    const tagged = resolveTerm('"Teos"@FI', registry);
    expect(tagged.termType).toBe("Literal");
    expect(tagged.value).toBe("Teos");
    expect(tagged.termType === "Literal" && tagged.language).toBe("fi");

    const typed = resolveTerm('"5"^^xsd:integer', registry);
    expect(typed.termType === "Literal" && typed.datatype.value).toBe(XSD.integer);

    const escaped = resolveTerm('"say \\"hi\\""', registry);
    expect(escaped.value).toBe('say "hi"');
  });

  it("types bare booleans and numbers", () => {
    const t = resolveTerm("true", registry);
    expect(t.termType === "Literal" && t.datatype.value).toBe(XSD.boolean);
    const i = resolveTerm("42", registry);
    expect(i.termType === "Literal" && i.datatype.value).toBe(XSD.integer);
    const d = resolveTerm("3.25", registry);
    expect(d.termType === "Literal" && d.datatype.value).toBe(XSD.decimal);
  });

  it("reads blank node labels", () => {
    const b = resolveTerm("_:u1", registry);
    expect(b.termType).toBe("BlankNode");
    expect(b.value).toBe("u1");
  });

  it("rejects unknown prefixes and bare words", () => {
    expect(codeOf(() => resolveTerm("zz:Thing", registry))).toBe("UNDEFINED_PREFIX");
    expect(codeOf(() => resolveTerm("banana", registry))).toBe("NOT_A_PREFIXED_NAME");
    expect(codeOf(() => resolveTerm('"open', registry))).toBe("INVALID_LITERAL");
  });

  it("names the row in the error message", () => {
    expect(() => resolveIri("zz:Thing", registry, { row: 4 })).toThrow(
      "Undefined prefix 'zz' while expanding 'zz:Thing' (row 4)",
    );
  });
});

describe("toPrefixed / shortLocalName", () => {
  it("prefers the longest matching namespace", () => {
    const nested = [
      { prefix: "rda", namespace: "http://rdaregistry.info/Elements/" },
      { prefix: "rdaw", namespace: "http://rdaregistry.info/Elements/w/" },
    ];
    expect(toPrefixed("http://rdaregistry.info/Elements/w/P10001", nested)).toBe("rdaw:P10001");
    expect(toPrefixed("http://other.org/x", nested)).toBe("http://other.org/x");
  });

  it("extracts local names", () => {
    expect(shortLocalName("http://example.org/vocab#Work")).toBe("Work");
    expect(shortLocalName(`${NS}title`)).toBe("title");
    expect(shortLocalName("ex:title")).toBe("title");
    expect(shortLocalName(undefined)).toBe("");
  });
});
