// ANSI SGR helpers for fzf labels and notifier output

const CODES = {
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

const RESET = '\x1b[0m';

export type AnsiStyle = keyof typeof CODES;

export function paint(text: string, ...styles: AnsiStyle[]): string {
  if (styles.length === 0 || text.length === 0) {
    return text;
  }
  return `${styles.map(style => CODES[style]).join('')}${text}${RESET}`;
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}
