import kleur from "kleur";

import type {
  LogContext,
  LogLevel,
  LogMethod,
  LogRecord,
  LogRecordError,
  LogTransport,
  Logger,
  TemplateLog,
  WritableLogLevel,
} from "./Logger";

export type EmojiMap = Record<string, string>;

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const levelOrder: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

type Message = { plain: string; colored: string };

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (value === null || value === undefined) return String(value);
  if (typeof value === "object") return stringify(value);
  return String(value);
}

function stringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => {
      if (v instanceof Error) return { name: v.name, message: v.message };
      if (typeof v === "bigint") return v.toString();
      return v;
    });
  } catch {
    return String(value);
  }
}

function toRecordError(error: Error): LogRecordError {
  return { name: error.name, message: error.message, stack: error.stack };
}

export class LoggerConsole implements Logger, AsyncDisposable {
  private readonly level: LogLevel;
  private readonly transports: LogTransport[];
  private readonly context: LogContext;
  private readonly emojiMap: EmojiMap;
  private readonly path: string[];

  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    level: LogLevel,
    transports: LogTransport[] = [],
    context: LogContext = {},
    emojiMap: EmojiMap = defaultEmojiMap,
    path: string[] = []
  ) {
    this.level = level;
    this.transports = transports;
    this.context = context;
    this.emojiMap = emojiMap;
    this.path = path;

    this.trace = this.createMethod("trace");
    this.debug = this.createMethod("debug");
    this.info = this.createMethod("info");
    this.warn = this.createMethod("warn");
    this.error = this.createMethod("error");
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      [...this.path, name]
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      this.path
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  isLevelEnabled(level: WritableLogLevel) {
    return levelOrder[level] >= levelOrder[this.level];
  }

  private createMethod(level: WritableLogLevel): LogMethod {
    const write = (
      context: LogContext,
      message: Message,
      values: Record<string, unknown>,
      stack: string | undefined
    ) => this.write(level, context, message, values, stack);
    const enabled = () => this.isLevelEnabled(level);

    function method(message: string): void;
    function method(context: LogContext, message: string): void;
    function method(context?: LogContext): TemplateLog;
    function method(
      first?: string | LogContext,
      message?: string
    ): TemplateLog | void {
      // 在呼叫點擷取 stack，讓錯誤位置指向呼叫 logger 的函式
      let stack: string | undefined;
      if (level === "error" && enabled()) {
        const holder: { stack?: string } = {};
        Error.captureStackTrace(holder, method);
        stack = holder.stack;
      }

      if (typeof first === "string") {
        if (enabled()) write({}, { plain: first, colored: first }, {}, stack);
        return;
      }
      if (message !== undefined) {
        if (enabled())
          write(first ?? {}, { plain: message, colored: message }, {}, stack);
        return;
      }

      const context = first ?? {};
      return (strings: TemplateStringsArray, ...values: unknown[]) => {
        if (!enabled()) return;
        let plain = "";
        let colored = "";
        const indexed: Record<string, unknown> = {};
        strings.forEach((part, i) => {
          plain += part;
          colored += part;
          if (i < values.length) {
            const text = formatValue(values[i]);
            plain += text;
            colored += kleur.green(text);
            indexed[`__${i}`] = values[i];
          }
        });
        write(context, { plain, colored }, indexed, stack);
      };
    }

    return method;
  }

  private resolveEmoji(
    level: WritableLogLevel,
    callEmoji: string | undefined,
    event: string | undefined,
    inheritedEmoji: string | undefined
  ): string {
    if (callEmoji) return callEmoji;
    if (event && this.emojiMap[event]) return this.emojiMap[event];
    // warn/error 的 level emoji 優先於繼承的 emoji
    if (level === "warn" || level === "error") {
      return this.emojiMap[level] ?? inheritedEmoji ?? "";
    }
    return inheritedEmoji ?? this.emojiMap[level] ?? "";
  }

  private write(
    level: WritableLogLevel,
    callContext: LogContext,
    message: Message,
    values: Record<string, unknown>,
    capturedStack: string | undefined
  ) {
    const {
      emoji: inheritedEmoji,
      event: inheritedEvent,
      ...baseContext
    } = this.context;
    const { emoji, event: callEvent, error, ...rest } = callContext;
    const event = callEvent ?? inheritedEvent;

    const context: Record<string, unknown> = {
      ...baseContext,
      ...rest,
      ...values,
    };

    let err: LogRecordError | undefined;
    if (error instanceof Error) {
      err = toRecordError(error);
    } else {
      if (error !== undefined) context.error = error;
      if (level === "error") {
        err = { name: "Error", message: message.plain, stack: capturedStack };
      }
    }

    const symbol = this.resolveEmoji(level, emoji, event, inheritedEmoji);
    const header = [...this.path, event ?? level].join(":");
    const contextText =
      Object.keys(context).length > 0 ? ` ${kleur.gray(stringify(context))}` : "";
    const line = `${symbol} ${header}: ${message.colored}${contextText}`;

    switch (level) {
      case "trace":
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        if (err?.stack) console.error(err.stack);
        break;
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path,
      event,
      msg: message.plain,
      context,
      err,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    for (const transport of transports) {
      await transport[Symbol.asyncDispose]();
    }
  }
}
