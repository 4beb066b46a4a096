import { paint, type AnsiStyle } from '../utils/ansi.js';

/**
 * 사용자에게 보이는 알림 (로그와 별개)
 */
export interface Notifier {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

/**
 * 터미널 알림 (stderr, TTY일 때만 색상)
 */
export class TerminalNotifier implements Notifier {
  private readonly color: boolean;

  constructor(
    private readonly stream: OutputStream = process.stderr,
    color?: boolean
  ) {
    this.color = color ?? (Boolean(stream.isTTY) && !process.env.NO_COLOR);
  }

  info(message: string): void {
    this.write(message, 'cyan');
  }

  success(message: string): void {
    this.write(message, 'green');
  }

  warn(message: string): void {
    this.write(message, 'yellow');
  }

  error(message: string): void {
    this.write(`Error: ${message}`, 'red', 'bold');
  }

  private write(message: string, ...styles: AnsiStyle[]): void {
    this.stream.write(`${this.color ? paint(message, ...styles) : message}\n`);
  }
}
