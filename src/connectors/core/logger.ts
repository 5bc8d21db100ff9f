import type { Logger } from "./types.js";

export interface ConsoleLoggerOptions {
  /** Prefix each line with an ISO timestamp. */
  timestamps?: boolean;
  clock?: () => Date;
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly timestamps: boolean;
  private readonly clock: () => Date;

  constructor(name: string, opts: ConsoleLoggerOptions = {}) {
    this.prefix = `[${name}]`;
    this.timestamps = opts.timestamps ?? false;
    this.clock = opts.clock ?? (() => new Date());
  }

  info(msg: string, data?: Record<string, unknown>): void {
    console.log(this.format(msg, data));
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    console.warn(this.format(`⚠ ${msg}`, data));
  }

  error(msg: string, data?: Record<string, unknown>): void {
    console.error(this.format(`✗ ${msg}`, data));
  }

  progress(current: number, total: number, label: string): void {
    const pct = total > 0 ? Math.round((current / total) * 100) : 0;
    console.log(this.format(`${label}: ${current}/${total} (${pct}%)`));
  }

  format(msg: string, data?: Record<string, unknown>): string {
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    const head = this.timestamps
      ? `${this.clock().toISOString()} ${this.prefix}`
      : this.prefix;
    return `${head} ${msg}${extra}`;
  }
}

export function createLogger(
  name: string,
  opts: ConsoleLoggerOptions = {},
): Logger {
  return new ConsoleLogger(name, opts);
}
