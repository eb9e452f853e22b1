import {describe, it, expect} from "vitest";
import {AssertionError, assert, intDiv, safeMultiply} from "../../src/index.js";

describe("intDiv", () => {
  it("should floor the quotient", () => {
    expect(intDiv(7, 2)).toBe(3);
    expect(intDiv(8, 2)).toBe(4);
    expect(intDiv(1, 32)).toBe(0);
  });
});

describe("safeMultiply", () => {
  it("should multiply safe integers", () => {
    expect(safeMultiply(1000, 32)).toBe(32000);
  });

  it("should throw past MAX_SAFE_INTEGER", () => {
    expect(() => safeMultiply(2 ** 50, 32)).toThrow(`Integer overflow: ${2 ** 50} * 32 exceeds MAX_SAFE_INTEGER`);
  });
});

describe("assert", () => {
  it("should throw AssertionError with the compared values", () => {
    expect(() => assert.lt(5, 5, "index out of range")).toThrow(new AssertionError("index out of range: 5 < 5"));
    expect(() => assert.equal(1, 2)).toThrow("Expected values to be equal: 1 === 2");
    expect(() => assert.true(false)).toThrow("Expect condition to be true");
  });

  it("should not throw when the condition holds", () => {
    expect(() => assert.lte(5, 5)).not.toThrow();
    expect(() => assert.gte(6, 5)).not.toThrow();
  });
});
