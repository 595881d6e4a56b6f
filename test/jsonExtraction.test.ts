import { describe, it, expect } from "vitest";
import { extractJson, stripCodeFences, stripLeadingProse } from "../lib/llm/jsonExtraction";

describe("stripCodeFences", () => {
  it("unwraps a json fence", () => {
    expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it("unwraps a bare fence", () => {
    expect(stripCodeFences('```\n[1, 2]\n```')).toBe("[1, 2]");
  });

  it("removes a dangling fence marker", () => {
    expect(stripCodeFences('```json\n{"a": 1}')).toBe('{"a": 1}');
  });
});

describe("stripLeadingProse", () => {
  it("starts at the first brace or bracket", () => {
    expect(stripLeadingProse('Sure! Here it is: {"a": [1]}')).toBe('{"a": [1]}');
    expect(stripLeadingProse("List: [1, {}]")).toBe("[1, {}]");
  });

  it("returns text without JSON unchanged", () => {
    expect(stripLeadingProse("no json here")).toBe("no json here");
  });
});

describe("extractJson", () => {
  it("parses fenced JSON with leading prose", () => {
    expect(extractJson('Here you go:\n```json\n{"word": "makan"}\n```')).toEqual({
      ok: true,
      value: { word: "makan" },
    });
  });

  it("drops trailing prose after the value", () => {
    expect(extractJson('{"word": "makan"} Hope this helps! {not json}')).toEqual({
      ok: true,
      value: { word: "makan" },
    });
  });

  it("removes trailing commas", () => {
    expect(extractJson('{"senses": ["a", "b",],}')).toEqual({ ok: true, value: { senses: ["a", "b"] } });
  });

  it("reports failure with the cleaned text", () => {
    expect(extractJson("I cannot help with that.")).toEqual({ ok: false, cleaned: "I cannot help with that." });
    expect(extractJson('{"word": ')).toEqual({ ok: false, cleaned: '{"word":' });
  });
});
