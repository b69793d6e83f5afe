export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export type LogLevelName = "error" | "warn" | "info" | "debug";

const levelsByName: Record<LogLevelName, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

export function parseLogLevel(name: LogLevelName): LogLevel {
  return levelsByName[name];
}

const colors = {
  reset: "\u001B[0m",
  red: "\u001B[31m",
  green: "\u001B[32m",
  yellow: "\u001B[33m",
  white: "\u001B[37m",
};

const emoji = {
  error: "❌",
  warn: "⚠️",
  info: "🔹",
  debug: "🐞",
  success: "⚡️",
};

export class Logger {
  constructor(private level: LogLevel = LogLevel.INFO) {}

  private shouldLog(level: LogLevel): boolean {
    return level <= this.level;
  }

  private formatData(data?: unknown): string {
    if (data === undefined) return "";
    if (data instanceof Error) {
      const stack = data.stack ? `\n${data.stack}` : "";
      return ` ${data.name}: ${data.message}${stack}`;
    }
    try {
      return ` ${JSON.stringify(data)}`;
    } catch {
      return ` ${String(data)}`;
    }
  }

  private withEmojiPrefix(
    kind: "error" | "warn" | "info" | "debug" | "success",
    message: string,
  ): string {
    return `${emoji[kind]} ${message}`;
  }

  error(message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;
    const msg = `${this.withEmojiPrefix("error", message)}${this.formatData(data)}`;
    console.error(`${colors.red}${msg}${colors.reset}`);
  }

  warn(message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    const msg = `${this.withEmojiPrefix("warn", message)}${this.formatData(data)}`;
    console.warn(`${colors.yellow}${msg}${colors.reset}`);
  }

  info(message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    const msg = `${this.withEmojiPrefix("info", message)}${this.formatData(data)}`;
    console.log(`${colors.white}${msg}${colors.reset}`);
  }

  debug(message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    const msg = `${this.withEmojiPrefix("debug", message)}${this.formatData(data)}`;
    console.log(msg);
  }

  success(message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    const msg = `${this.withEmojiPrefix("success", message)}${this.formatData(data)}`;
    console.log(`${colors.green}${msg}${colors.reset}`);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

}

// Default logger instance
export const logger = new Logger();

