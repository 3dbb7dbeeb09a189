/**
 * SVG path data decoding.
 *
 * Supports the move, line, cubic curve and close commands in both
 * absolute (upper-case) and relative (lower-case) form. Relative
 * coordinates are resolved against the current point, so every decoded
 * command carries absolute coordinates.
 */

import { formatOperation } from "#src/helpers/format";

export type PathCommand =
  | { type: "moveTo"; x: number; y: number }
  | { type: "lineTo"; x: number; y: number }
  | { type: "curveTo"; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
  | { type: "closePath" };

// Command letter followed by its arguments. E and e are left out because
// they only ever appear as number exponents.
const RUN_PATTERN = /([A-DF-Za-df-z])([^A-DF-Za-df-z]*)/g;
const NUMBER_PATTERN = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/g;

const ARGUMENT_COUNTS: Readonly<Partial<Record<string, number>>> = {
  M: 2,
  L: 2,
  C: 6,
  Z: 0,
};

/**
 * Extract every number from a run of path arguments.
 */
export function scanNumbers(text: string): number[] {
  return Array.from(text.matchAll(NUMBER_PATTERN), match => Number(match[0]));
}

/**
 * Decode path data into absolute commands.
 *
 * Commands other than M, L, C and Z (either case) produce nothing. A
 * command with too few numbers produces nothing; numbers beyond what a
 * command takes are ignored. Each of these is reported through
 * `onWarning`.
 *
 * @example
 * ```ts
 * parsePathData("M 10 10 l 5 0 z")
 * // [moveTo(10, 10), lineTo(15, 10), closePath]
 * ```
 */
export function parsePathData(d: string, onWarning?: (message: string) => void): PathCommand[] {
  const commands: PathCommand[] = [];
  let current = { x: 0, y: 0 };
  let subpathStart = { x: 0, y: 0 };

  const firstCommand = d.search(RUN_PATTERN);
  const leading = firstCommand === -1 ? d : d.slice(0, firstCommand);

  if (leading.trim().length > 0) {
    onWarning?.(`Ignored path data before the first command: "${leading.trim()}"`);
  }

  for (const [, letter, args] of d.matchAll(RUN_PATTERN)) {
    const command = letter.toUpperCase();
    const needed = ARGUMENT_COUNTS[command];

    if (needed === undefined) {
      onWarning?.(`Unsupported path command "${letter}" ignored`);
      continue;
    }

    const numbers = scanNumbers(args);

    if (numbers.length < needed) {
      onWarning?.(`Path command ${letter} needs ${needed} numbers, got ${numbers.length}`);
      continue;
    }

    if (numbers.length > needed) {
      const extra = numbers.length - needed;

      onWarning?.(
        `Ignored ${extra} extra ${extra === 1 ? "number" : "numbers"} after path command ${letter}`,
      );
    }

    const relative = letter !== command;
    const point = (i: number) =>
      relative
        ? { x: current.x + numbers[i], y: current.y + numbers[i + 1] }
        : { x: numbers[i], y: numbers[i + 1] };

    switch (command) {
      case "M": {
        current = point(0);
        subpathStart = current;
        commands.push({ type: "moveTo", ...current });
        break;
      }
      case "L": {
        current = point(0);
        commands.push({ type: "lineTo", ...current });
        break;
      }
      case "C": {
        const control1 = point(0);
        const control2 = point(2);
        const end = point(4);

        commands.push({
          type: "curveTo",
          x1: control1.x,
          y1: control1.y,
          x2: control2.x,
          y2: control2.y,
          x: end.x,
          y: end.y,
        });
        current = end;
        break;
      }
      case "Z": {
        current = subpathStart;
        commands.push({ type: "closePath" });
        break;
      }
    }
  }

  return commands;
}

/**
 * Convert a path command to its content-stream operator.
 */
export function pathCommandToOperator(command: PathCommand): string {
  switch (command.type) {
    case "moveTo":
      return formatOperation([command.x, command.y], "m");
    case "lineTo":
      return formatOperation([command.x, command.y], "l");
    case "curveTo":
      return formatOperation(
        [command.x1, command.y1, command.x2, command.y2, command.x, command.y],
        "c",
      );
    case "closePath":
      return "h";
  }
}

/**
 * Decode path data straight to operator lines.
 */
export function pathDataToOperators(d: string, onWarning?: (message: string) => void): string[] {
  return parsePathData(d, onWarning).map(pathCommandToOperator);
}
