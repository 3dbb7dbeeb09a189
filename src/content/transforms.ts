/**
 * Group transforms as `cm` operators.
 *
 * Each transform becomes its own `cm`; the viewer concatenates them onto
 * the current transformation matrix in order, so nothing is multiplied
 * here.
 */

import type { TransformOp } from "#src/elements/types";
import { formatOperation } from "#src/helpers/format";

/**
 * PDF affine matrix `[a b c d e f]`.
 */
export type Matrix = [number, number, number, number, number, number];

/**
 * Matrix for a single transform.
 *
 * - translate: `[1 0 0 1 dx dy]`
 * - scale: `[sx 0 0 sy 0 0]`
 * - rotate: `[cos sin -sin cos 0 0]`, counter-clockwise in degrees
 */
export function transformMatrix(op: TransformOp): Matrix {
  switch (op.type) {
    case "translate":
      return [1, 0, 0, 1, op.dx, op.dy];
    case "scale":
      return [op.sx, 0, 0, op.sy, 0, 0];
    case "rotate": {
      const radians = (op.degrees * Math.PI) / 180;
      const cos = Math.cos(radians);
      const sin = Math.sin(radians);

      return [cos, sin, -sin, cos, 0, 0];
    }
  }
}

/**
 * The `a b c d e f cm` operator for a single transform.
 *
 * @example
 * ```ts
 * transformToOperator({ type: "translate", dx: 10, dy: 20 }) // "1 0 0 1 10 20 cm"
 * ```
 */
export function transformToOperator(op: TransformOp): string {
  return formatOperation(transformMatrix(op), "cm");
}
