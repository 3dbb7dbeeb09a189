import { describe, expect, it } from "vitest";
import { transformMatrix, transformToOperator } from "./transforms";

describe("transformMatrix", () => {
  it("builds translate and scale matrices", () => {
    expect(transformMatrix({ type: "translate", dx: 10, dy: -20 })).toEqual([1, 0, 0, 1, 10, -20]);
    expect(transformMatrix({ type: "scale", sx: 2, sy: 0.5 })).toEqual([2, 0, 0, 0.5, 0, 0]);
  });

  it("builds rotation matrices", () => {
    const [a, b, c, d, e, f] = transformMatrix({ type: "rotate", degrees: 30 });

    expect(a).toBeCloseTo(Math.sqrt(3) / 2, 12);
    expect(b).toBeCloseTo(0.5, 12);
    expect(c).toBeCloseTo(-0.5, 12);
    expect(d).toBeCloseTo(Math.sqrt(3) / 2, 12);
    expect([e, f]).toEqual([0, 0]);
  });
});

describe("transformToOperator", () => {
  it("writes cm operators", () => {
    expect(transformToOperator({ type: "translate", dx: 10, dy: 20 })).toBe("1 0 0 1 10 20 cm");
    expect(transformToOperator({ type: "scale", sx: 2, sy: 3 })).toBe("2 0 0 3 0 0 cm");
    expect(transformToOperator({ type: "rotate", degrees: 0 })).toBe("1 0 0 1 0 0 cm");
  });

  it("never writes exponent notation", () => {
    const operator = transformToOperator({ type: "rotate", degrees: 90 });

    expect(operator).toBe("0.00000000000000006123 1 -1 0.00000000000000006123 0 0 cm");
  });
});
