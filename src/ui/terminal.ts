/**
 * Terminal UI
 *
 * Styled line output for the drift report. Writes to an injected sink so
 * the same renderer serves stdout, stderr and tests.
 */

import type { TextSink } from '../utils';

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export type ColorName = Exclude<keyof typeof colors, 'reset' | 'bold' | 'dim'>;

export interface TerminalUIOptions {
  /** Emit ANSI escapes; off for pipes and tests */
  color?: boolean;
  /** Divider width, defaults to the sink's column count or 80 */
  width?: number;
}

function sinkColumns(sink: TextSink): number | undefined {
  if ('columns' in sink && typeof sink.columns === 'number' && sink.columns > 0) {
    return sink.columns;
  }
  return undefined;
}

export class TerminalUI {
  private sink: TextSink;
  private useColor: boolean;
  private width: number;

  constructor(sink: TextSink, options: TerminalUIOptions = {}) {
    this.sink = sink;
    this.useColor = options.color ?? false;
    this.width = options.width ?? sinkColumns(sink) ?? 80;
  }

  // ==================== Color Helpers ====================

  color(text: string, colorName: ColorName): string {
    return this.wrap(text, colors[colorName]);
  }

  bold(text: string): string {
    return this.wrap(text, colors.bold);
  }

  dim(text: string): string {
    return this.wrap(text, colors.dim);
  }

  private wrap(text: string, code: string): string {
    return this.useColor ? `${code}${text}${colors.reset}` : text;
  }

  // ==================== Output Methods ====================

  print(text: string = ''): void {
    this.sink.write(`${text}\n`);
  }

  newLine(): void {
    this.print();
  }

  // ==================== Message Types ====================

  error(message: string): void {
    this.print(`  ${this.color('✗', 'red')} ${this.color(message, 'red')}`);
  }

  // ==================== Dividers ====================

  divider(char: string = '─'): void {
    this.print(this.dim(char.repeat(this.width)));
  }

  section(title: string): void {
    this.newLine();
    this.print(this.bold(this.color(title, 'cyan')));
    this.divider();
  }
}
