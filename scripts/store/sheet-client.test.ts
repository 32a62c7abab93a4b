import { describe, expect, it } from "vitest";

import { columnLetter, isAuthFailure, parseJsonObject, rangeOf } from "./sheet-client";

describe("sheet ranges", () => {
  it("converts column numbers to letters", () => {
    expect([1, 26, 27, 52, 703].map(columnLetter)).toEqual(["A", "Z", "AA", "AZ", "AAA"]);
  });

  it("builds A1 ranges", () => {
    expect(rangeOf("tab1", 1, 3, 11)).toBe("tab1!A1:K3");
    expect(rangeOf("tab1", 52, 0, 0)).toBe("tab1!A52:A52");
  });
});

describe("isAuthFailure", () => {
  it("recognises expired and invalid tokens", () => {
    expect(isAuthFailure({ httpStatus: 401, code: null })).toBe(true);
    expect(isAuthFailure({ httpStatus: 400, code: 99991663 })).toBe(true);
    expect(isAuthFailure({ httpStatus: 200, code: 99991661 })).toBe(true);
    expect(isAuthFailure({ httpStatus: 200, code: 90221 })).toBe(false);
  });
});

describe("parseJsonObject", () => {
  it("accepts only JSON objects", () => {
    expect(parseJsonObject('{"code":0}')).toEqual({ code: 0 });
    expect(parseJsonObject("[1]")).toBeNull();
    expect(parseJsonObject("<html>")).toBeNull();
    expect(parseJsonObject("")).toBeNull();
  });
});
