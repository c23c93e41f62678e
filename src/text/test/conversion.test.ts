import { describe, expect, it } from "vitest";

import { parseInteger, parseNumber, toText } from "../conversion.ts";
import { ParseError } from "../text_errors.ts";
import { TextView } from "../text_view.ts";
import { expectErr, expectOk } from "./result_helpers.ts";

const parse = (text: string) => parseNumber(TextView.from(text));

describe("parseNumber", () => {
  it("parses integers and decimals", () => {
    expect(expectOk(parse("42"))).toBe(42);
    expect(expectOk(parse("-3.5e2"))).toBe(-350);
    expect(expectOk(parse("+.25"))).toBe(0.25);
    expect(expectOk(parse("7."))).toBe(7);
  });

  it("parses infinities and NaN", () => {
    expect(expectOk(parse("inf"))).toBe(Infinity);
    expect(expectOk(parse("-Infinity"))).toBe(-Infinity);
    expect(expectOk(parse("NaN"))).toBeNaN();
  });

  it("reports non-numeric text", () => {
    const error = expectErr(parse("abc"), ParseError);
    expect(error.kind).toBe("invalid");
    expect(error.input).toBe("abc");
    expect(error.message).toBe('Invalid number: "abc"');
  });

  it("reports empty text", () => {
    expect(expectErr(parse(""), ParseError).kind).toBe("empty");
  });

  it("does not skip whitespace or accept other radixes", () => {
    expectErr(parse(" 42"), ParseError);
    expectErr(parse("0x1f"), ParseError);
    expectErr(parse("1_000"), ParseError);
  });

  it("parses a trimmed slice of a larger text", () => {
    const view = TextView.from("  value: 12.5  ").trim();
    const number = expectOk(view.slice(7, view.length()));
    expect(expectOk(parseNumber(number))).toBe(12.5);
  });
});

describe("parseInteger", () => {
  const integer = (text: string) => parseInteger(TextView.from(text));

  it("parses signed digits", () => {
    expect(expectOk(integer("123"))).toBe(123);
    expect(expectOk(integer("-45"))).toBe(-45);
    expect(Object.is(expectOk(integer("-0")), 0)).toBe(true);
  });

  it("rejects fractions", () => {
    expect(expectErr(integer("12.5"), ParseError).kind).toBe("invalid");
  });

  it("rejects values beyond the safe integer range", () => {
    const error = expectErr(integer("9007199254740993"), ParseError);
    expect(error.kind).toBe("out-of-range");
  });
});

describe("toText", () => {
  it("formats numbers in shortest round-trip form", () => {
    expect(toText(42).toString()).toBe("42");
    expect(toText(0.1).toString()).toBe("0.1");
    expect(toText(-1e21).toString()).toBe("-1e+21");
  });

  it("returns an owned buffer", () => {
    const buffer = toText(7);
    expect(buffer.len()).toBe(1);
    expect(buffer.capacity()).toBe(1);
  });
});
