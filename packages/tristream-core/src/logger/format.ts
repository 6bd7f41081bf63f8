/**
 * Tristream Logger - 格式化
 *
 * 行模板：{asctime}.{msecs} - {levelname:8} [{filename}:{lineno}] {message}
 * 日期模板：YYYY-MM-DD HH:mm:ss
 */

import { format as formatArgs, inspect } from "node:util";
import type { LogRecord } from "./types.js";
import { LOG_LEVEL_NAME } from "./types.js";

export const DEFAULT_FORMAT = "{asctime}.{msecs} - {levelname:8} [{filename}:{lineno}] {message}";
export const DEFAULT_DATE_FORMAT = "YYYY-MM-DD HH:mm:ss";

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** 按 YYYY/MM/DD/HH/mm/ss/SSS 渲染日期，默认本地时间 */
export function formatDate(date: Date, pattern: string, utc = false): string {
  const parts: Record<string, string> = utc
    ? {
        YYYY: String(date.getUTCFullYear()),
        MM: pad(date.getUTCMonth() + 1),
        DD: pad(date.getUTCDate()),
        HH: pad(date.getUTCHours()),
        mm: pad(date.getUTCMinutes()),
        ss: pad(date.getUTCSeconds()),
        SSS: pad(date.getUTCMilliseconds(), 3),
      }
    : {
        YYYY: String(date.getFullYear()),
        MM: pad(date.getMonth() + 1),
        DD: pad(date.getDate()),
        HH: pad(date.getHours()),
        mm: pad(date.getMinutes()),
        ss: pad(date.getSeconds()),
        SSS: pad(date.getMilliseconds(), 3),
      };
  return pattern.replace(/YYYY|SSS|MM|DD|HH|mm|ss/g, (token) => parts[token] ?? token);
}

/** 字段补齐宽度之后再套用的装饰（如终端颜色） */
export type FieldDecorators = Partial<Record<string, (value: string) => string>>;

/** 替换 {field} / {field:N}，N 为右侧补空格后的最小宽度；未知字段原样保留 */
export function renderTemplate(
  template: string,
  fields: Record<string, string>,
  decorators: FieldDecorators = {},
): string {
  return template.replace(/\{(\w+)(?::(\d+))?\}/g, (whole, key: string, width?: string) => {
    const value = fields[key];
    if (value === undefined) return whole;
    const padded = width ? value.padEnd(Number(width)) : value;
    const decorate = decorators[key];
    return decorate ? decorate(padded) : padded;
  });
}

/** 非字符串消息转为文本：优先 JSON，JSON 表达不了的交给 inspect */
export function stringifyMessage(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return `${errorKind(value)}: ${value.message}`;
  try {
    const json = JSON.stringify(value);
    if (json !== undefined) return json;
  } catch {
    // 循环引用、BigInt 等，下面用 inspect
  }
  return inspect(value);
}

/** 有插值参数时按 printf 风格渲染（%s %d %j %o ...） */
export function interpolate(message: unknown, args: readonly unknown[]): string {
  const text = stringifyMessage(message);
  return args.length > 0 ? formatArgs(text, ...args) : text;
}

/** 运行时类型名：Error 子类取构造函数名，原始值取包装类型名 */
export function errorKind(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  const boxed: { constructor?: unknown } = Object(value);
  if (typeof boxed.constructor === "function" && boxed.constructor.name) {
    return boxed.constructor.name;
  }
  return "Object";
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

/** 堆栈块：首行 "<类型>: <消息>"，其后为 at ... 帧；没有堆栈时只有首行 */
export function formatStack(error: unknown): string {
  const header = `${errorKind(error)}: ${errorMessage(error)}`;
  const stack = error instanceof Error ? error.stack : undefined;
  if (!stack) return header;
  const frames = stack.split("\n").filter((line) => /^\s+at /.test(line));
  return [header, ...frames].join("\n");
}

export function formatRecord(
  record: LogRecord,
  template: string,
  dateFormat: string,
  decorators?: FieldDecorators,
): string {
  const line = renderTemplate(template, {
    asctime: formatDate(record.timestamp, dateFormat),
    msecs: pad(record.timestamp.getMilliseconds(), 3),
    levelname: LOG_LEVEL_NAME[record.level],
    name: record.sink,
    filename: record.filename,
    lineno: String(record.lineno),
    funcName: record.funcName,
    message: record.message,
  }, decorators);
  return record.stack ? `${line}\n${record.stack}` : line;
}
