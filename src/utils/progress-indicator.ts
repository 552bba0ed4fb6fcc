/**
 * Simple Progress Indicator (no external dependencies)
 *
 * Features:
 * - ASCII-only spinner frames (cross-platform compatible)
 * - TTY detection (no spinners in pipes/logs)
 * - Elapsed time display
 * - Silent mode for scripted use
 */

interface ProgressOptions {
  frames?: string[];
  interval?: number;
  /** Print nothing at all */
  quiet?: boolean;
  /** Output stream (default: process.stderr) */
  stream?: NodeJS.WritableStream & { isTTY?: boolean };
}

export class ProgressIndicator {
  private message: string;
  private readonly frames: string[];
  private readonly intervalMs: number;
  private readonly quiet: boolean;
  private readonly stream: NodeJS.WritableStream;
  private frameIndex = 0;
  private timer: NodeJS.Timeout | null = null;
  private readonly startTime: number;
  private readonly isTTY: boolean;

  constructor(message: string, options: ProgressOptions = {}) {
    this.message = message;
    this.frames = options.frames || ['|', '/', '-', '\\'];
    this.intervalMs = options.interval ?? 80;
    this.quiet = options.quiet ?? false;
    this.stream = options.stream ?? process.stderr;
    this.startTime = Date.now();

    // Only animate on an interactive stderr outside CI
    const streamIsTTY = options.stream ? options.stream.isTTY : process.stderr.isTTY;
    this.isTTY = streamIsTTY === true && !process.env.CI && !process.env.NO_COLOR;
  }

  private write(text: string): void {
    if (!this.quiet) this.stream.write(text);
  }

  private elapsed(): string {
    return ((Date.now() - this.startTime) / 1000).toFixed(1);
  }

  start(): void {
    if (!this.isTTY) {
      this.write(`[i] ${this.message}...\n`);
      return;
    }
    if (this.quiet) return;

    this.timer = setInterval(() => {
      const frame = this.frames[this.frameIndex];
      this.write(`\r[${frame}] ${this.message}... (${this.elapsed()}s)`);
      this.frameIndex = (this.frameIndex + 1) % this.frames.length;
    }, this.intervalMs);
    this.timer.unref();
  }

  /**
   * Stop spinner with success message
   */
  succeed(message?: string): void {
    this.stop();
    const finalMessage = message || this.message;
    this.write(
      this.isTTY ? `\r[OK] ${finalMessage} (${this.elapsed()}s)\n` : `[OK] ${finalMessage}\n`
    );
  }

  /**
   * Stop spinner with failure message
   */
  fail(message?: string): void {
    this.stop();
    const finalMessage = message || this.message;
    this.write(this.isTTY ? `\r[X] ${finalMessage}\n` : `[X] ${finalMessage}\n`);
  }

  /**
   * Update spinner message (while running). Non-TTY output gets a new line per phase.
   */
  update(newMessage: string): void {
    this.message = newMessage;
    if (!this.isTTY) this.write(`[i] ${newMessage}...\n`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.write('\r\x1b[K');
    }
  }
}

export default ProgressIndicator;
