import type { Logger } from "./types.js";

export class ConsoleLogger implements Logger {
  private readonly prefix: string;

  constructor(component: string) {
    this.prefix = `[${component}]`;
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
    if (!process.stdout.isTTY) return;
    const pct = total > 0 ? Math.round((current / total) * 100) : 0;
    process.stdout.write(
      `\r${this.prefix} ${label}: ${current}/${total} (${pct}%)`,
    );
    if (current >= total) process.stdout.write("\n");
  }
}

function formatData(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : "";
}

export function createLogger(component: string): Logger {
  return new ConsoleLogger(component);
}
