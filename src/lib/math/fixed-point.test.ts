import { describe, expect, it } from "vitest";

import { ArithmeticFaultError } from "@/lib/errors";

import {
  MAX_64X64,
  MAX_INT256,
  ONE_64X64,
  assertInt256,
  divu,
  exp,
  fromInt,
  mul,
  mulDivInt256,
  neg,
  toInt,
} from "./fixed-point";

describe("64.64 conversions", () => {
  it("should round-trip integers", () => {
    expect(fromInt(42n)).toBe(42n * ONE_64X64);
    expect(toInt(fromInt(-7n))).toBe(-7n);
  });

  it("should floor toward negative infinity in toInt", () => {
    expect(toInt(ONE_64X64 + ONE_64X64 / 2n)).toBe(1n);
    expect(toInt(-ONE_64X64 / 2n)).toBe(-1n);
  });

  it("should fault when an integer does not fit 64.64", () => {
    expect(() => fromInt(1n << 63n)).toThrow(ArithmeticFaultError);
  });
});

describe("divu", () => {
  it("should divide unsigned integers into 64.64", () => {
    expect(divu(1n, 3n)).toBe(6148914691236517205n);
    expect(divu(50_000_000n, 1_000_000_000n)).toBe(ONE_64X64 / 20n);
  });

  it("should fault on division by zero", () => {
    expect(() => divu(1n, 0n)).toThrow(ArithmeticFaultError);
  });

  it("should reject signed operands", () => {
    expect(() => divu(-1n, 2n)).toThrow(ArithmeticFaultError);
  });
});

describe("mul and neg", () => {
  it("should multiply 64.64 values", () => {
    expect(mul(fromInt(2n), fromInt(3n))).toBe(fromInt(6n));
    expect(mul(ONE_64X64 / 2n, fromInt(-3n))).toBe(-3n * (ONE_64X64 / 2n));
  });

  it("should fault when a product overflows", () => {
    expect(() => mul(MAX_64X64, fromInt(2n))).toThrow(ArithmeticFaultError);
  });

  it("should fault when negating the minimum value", () => {
    expect(() => neg(-(1n << 127n))).toThrow(ArithmeticFaultError);
  });
});

describe("exp", () => {
  it("should return exactly one at zero", () => {
    expect(exp(0n)).toBe(ONE_64X64);
  });

  it("should evaluate e and 1/e", () => {
    // e * 2^64 = 50143449209799256682.7...
    expect(exp(ONE_64X64)).toBe(50143449209799256682n);
    // 2^64 / e = 6786177901268885274.7...
    expect(exp(-ONE_64X64)).toBe(6786177901268885274n);
  });

  it("should be monotonic across negative inputs", () => {
    const inputs = [-20n, -5n, -1n, 0n].map((value) => fromInt(value));
    const outputs = inputs.map((value) => exp(value));

    for (let i = 1; i < outputs.length; i++) {
      expect(outputs[i]).toBeGreaterThan(outputs[i - 1] ?? 0n);
    }
  });

  it("should underflow to zero below -64", () => {
    expect(exp(fromInt(-65n))).toBe(0n);
  });

  it("should fault at or above 64", () => {
    expect(() => exp(fromInt(64n))).toThrow(ArithmeticFaultError);
  });

  it("should fault when the result leaves 64.64", () => {
    // e^50 > 2^63
    expect(() => exp(fromInt(50n))).toThrow(ArithmeticFaultError);
  });
});

describe("int256 guards", () => {
  it("should pass values inside the signed 256-bit range", () => {
    expect(assertInt256(MAX_INT256, "test")).toBe(MAX_INT256);
  });

  it("should fault outside the signed 256-bit range", () => {
    expect(() => assertInt256(MAX_INT256 + 1n, "test")).toThrow(ArithmeticFaultError);
  });

  it("should truncate mulDiv toward zero", () => {
    expect(mulDivInt256(-7n, 3n, 2n, "test")).toBe(-10n);
    expect(mulDivInt256(7n, 3n, 2n, "test")).toBe(10n);
  });

  it("should fault on mulDiv overflow and division by zero", () => {
    expect(() => mulDivInt256(MAX_INT256, 2n, 1n, "test")).toThrow(ArithmeticFaultError);
    expect(() => mulDivInt256(1n, 1n, 0n, "test")).toThrow(ArithmeticFaultError);
  });
});
