/**
 * Terminal display utilities
 */

import type { Writable } from 'stream';

// ANSI color codes (avoiding chalk dependency issues with ESM)
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
};

type ColorName = Exclude<keyof typeof colors, 'reset'>;

export function color(text: string, ...codes: ColorName[]): string {
  const prefix = codes.map((c) => colors[c]).join('');
  return `${prefix}${text}${colors.reset}`;
}

/**
 * Writes REPL output to a stream. Colors are applied only when enabled,
 * so piped output and tests see plain text.
 */
export class Display {
  constructor(
    private readonly out: Writable,
    private readonly useColor = false,
  ) {}

  private paint(text: string, ...codes: ColorName[]): string {
    return this.useColor ? color(text, ...codes) : text;
  }

  write(text: string): void {
    this.out.write(text);
  }

  line(text = ''): void {
    this.out.write(`${text}\n`);
  }

  prompt(label: string): void {
    this.out.write(`\n${this.paint(label, 'bold')}`);
  }

  banner(tools: string[]): void {
    this.line();
    this.line(`Connected to server with tools: ${tools.join(', ')}`);
    this.line(this.paint('Roaming agent started!', 'green'));
    this.line(`Type your queries or ${this.paint("'quit'", 'dim')} to exit.`);
  }

  transcript(text: string): void {
    this.line();
    this.line(text);
  }

  timing(summary: string): void {
    this.line();
    this.line(this.paint(summary, 'dim'));
  }

  error(err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    this.line();
    this.line(this.paint(`Error: ${message}`, 'red'));
  }

  warn(message: string): void {
    this.line(this.paint(message, 'yellow'));
  }

  /**
   * Show a simple spinner. Does nothing unless colors (a TTY) are enabled.
   */
  spinner(text: string): { stop: () => void } {
    if (!this.useColor) {
      return { stop: () => undefined };
    }

    const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
    let i = 0;

    this.out.write(`\n${color(frames[0], 'dim')} ${color(text, 'dim')}`);

    const interval = setInterval(() => {
      i = (i + 1) % frames.length;
      this.out.write(`\r${color(frames[i], 'dim')} ${color(text, 'dim')}`);
    }, 80);

    return {
      stop: () => {
        clearInterval(interval);
        this.out.write('\r\x1b[K');
      },
    };
  }
}
