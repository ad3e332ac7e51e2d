import type { Logger } from "./types.js";

function formatData(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : "";
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;

  constructor(scope: string) {
    this.prefix = `[${scope}]`;
  }

  info(msg: string, data?: Record<string, unknown>): void {
    console.log(`${this.prefix} ${msg}${formatData(data)}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    console.warn(`${this.prefix} ⚠ ${msg}${formatData(data)}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ✗ ${msg}${formatData(data)}`);
  }

  progress(current: number, total: number, label: string): void {
    const pct = total > 0 ? Math.min(100, Math.round((current / total) * 100)) : 0;
    const line = `${this.prefix} ${label}: ${current}/${total} (${pct}%)`;
    // Redirected output gets one line at the end instead of a redrawn counter
    if (!process.stdout.isTTY) {
      if (current >= total) console.log(line);
      return;
    }
    process.stdout.write(`\r${line}`);
    if (current >= total) process.stdout.write("\n");
  }
}

export function createLogger(scope: string): Logger {
  return new ConsoleLogger(scope);
}
