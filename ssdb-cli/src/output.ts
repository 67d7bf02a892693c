/**
 * Terminal output helpers: chalk painting of styled lines and the
 * `Error: <msg>` exit path shared by all commands.
 */

import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import { toMessage } from 'ssdb-shared';
import type { Segment, StyledLine } from 'ssdb-shared';

const PAINTERS: Record<string, ChalkInstance> = {
  blue: chalk.blue,
  cyan: chalk.cyan,
  gray: chalk.gray,
  magenta: chalk.magenta,
  magentaBright: chalk.magentaBright,
  white: chalk.white,
  yellow: chalk.yellow,
  yellowBright: chalk.yellowBright,
};

export function paintSegment(seg: Segment): string {
  let paint: ChalkInstance = (seg.color !== undefined && PAINTERS[seg.color]) || chalk;
  if (seg.bold) paint = paint.bold;
  if (seg.dim) paint = paint.dim;
  return paint(seg.text);
}

export function paintLine(line: StyledLine): string {
  return line.map(paintSegment).join('');
}

export function writeJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

export function rule(width: number): string {
  return chalk.dim('─'.repeat(width));
}

export function fail(err: unknown): never {
  process.stderr.write(`Error: ${toMessage(err)}\n`);
  process.exit(1);
}
