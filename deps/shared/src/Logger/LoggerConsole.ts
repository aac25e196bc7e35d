import kleur from "kleur";

import {
  type EmojiMap,
  type LogContext,
  type LogLevel,
  type LogMethod,
  type LogRecord,
  type LogTransport,
  type Logger,
  type SerializedError,
  type TemplateLog,
  logLevels,
} from "./Logger";

const noop: TemplateLog = () => {};

export class LoggerConsole implements Logger {
  readonly trace: LogMethod = this.createMethod("trace");
  readonly debug: LogMethod = this.createMethod("debug");
  readonly info: LogMethod = this.createMethod("info");
  readonly warn: LogMethod = this.createMethod("warn");
  readonly error: LogMethod = this.createMethod("error");

  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly transports: LogTransport[] = []
  ) {}

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  private enabled(level: LogLevel) {
    return logLevels.indexOf(level) >= logLevels.indexOf(this.level);
  }

  private createMethod(level: LogLevel): LogMethod {
    const method = (arg?: string | LogContext, message?: string): TemplateLog => {
      if (!this.enabled(level)) return noop;
      if (typeof arg === "string") {
        this.write(level, {}, arg, arg, method);
        return noop;
      }
      if (message !== undefined) {
        this.write(level, arg ?? {}, message, message, method);
        return noop;
      }
      const template: TemplateLog = (strings, ...values) => {
        const context: LogContext = { ...(arg ?? {}) };
        let plain = strings[0];
        let colored = strings[0];
        values.forEach((value, i) => {
          context[`__${i}`] = value;
          plain += formatValue(value) + strings[i + 1];
          colored += kleur.green(formatValue(value)) + strings[i + 1];
        });
        this.write(level, context, plain, colored, template);
      };
      return template;
    };
    return method;
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    msg: string,
    coloredMsg: string,
    // 產生 stack 時要略過的呼叫點，讓第一個 frame 指向使用者的程式碼
    stackFrom: Function
  ) {
    const { event: callEvent, emoji: callEmoji, error, ...rest } = callContext;
    const {
      event: baseEvent,
      emoji: baseEmoji,
      error: _baseError,
      ...baseRest
    } = this.context;
    const event = callEvent ?? baseEvent;
    const context: Record<string, unknown> = { ...baseRest, ...rest };

    const emoji =
      callEmoji ??
      (event !== undefined ? this.emojiMap[event] : undefined) ??
      (level !== "info" ? this.emojiMap[level] : undefined) ??
      baseEmoji ??
      this.emojiMap[level];

    let err: SerializedError | undefined;
    if (error !== undefined) {
      err = serializeError(error);
    } else if (level === "error") {
      const captured = new Error(msg);
      Error.captureStackTrace(captured, stackFrom);
      err = serializeError(captured);
    }

    const label = [...this.path, event ?? level].join(":");
    const contextJson = stringifyContext(context);
    const line = [emoji, `${label}: ${coloredMsg}`, contextJson]
      .filter((part) => part !== undefined && part !== "")
      .join(" ");

    switch (level) {
      case "error":
        console.error(line);
        if (err) console.error(err.stack ?? `${err.name}: ${err.message}`);
        break;
      case "warn":
        console.warn(line);
        break;
      case "info":
        console.info(line);
        break;
      default:
        console.debug(line);
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      level,
      time: new Date().toISOString(),
      path: this.path.join(":"),
      event,
      msg,
      err,
      context,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) {
    return stringifyContext(value) ?? String(value);
  }
  return String(value);
}

function stringifyContext(value: object): string | undefined {
  if (Object.keys(value).length === 0) return undefined;
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v
    );
  } catch {
    return "[unserializable context]";
  }
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (typeof error === "object" && error !== null) {
    const fields: Record<string, unknown> = { ...error };
    const name = typeof fields.type === "string" ? fields.type : "Error";
    const message =
      typeof fields.message === "string"
        ? fields.message
        : (stringifyContext(error) ?? "");
    return { ...fields, name, message };
  }
  return { name: "Error", message: String(error) };
}
