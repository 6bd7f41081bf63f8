/**
 * Tristream Logger - 控制台输出 Transport
 *
 * output 镜像到 stdout，fault 镜像到 stderr；终端下按级别着色。
 */

import type { FieldDecorators } from "./format.js";
import type { LogLevel, LogRecord, LogTransport } from "./types.js";

/** ANSI 颜色码 */
const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  gray: "\x1b[90m",
} as const;

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warning: COLORS.yellow,
  error: COLORS.red,
  critical: COLORS.magenta,
};

/** 只给 {levelname} 字段着色，补齐的空格也在颜色内 */
function levelColor(level: LogLevel): FieldDecorators {
  return { levelname: (value) => `${LEVEL_COLOR[level]}${value}${COLORS.reset}` };
}

/** 带字段装饰重新渲染一条记录 */
export type RecordRenderer = (record: LogRecord, decorators: FieldDecorators) => string;

export interface ConsoleTransport extends LogTransport {
  readonly kind: "stream";
  readonly stream: NodeJS.WritableStream;
}

function isTTY(stream: NodeJS.WritableStream): boolean {
  return "isTTY" in stream && stream.isTTY === true;
}

/**
 * 终端流且提供了 render 时给级别着色；否则原样写出已格式化的行。
 */
export function createConsoleTransport(stream: NodeJS.WritableStream, render?: RecordRenderer): ConsoleTransport {
  const colored = isTTY(stream);
  return {
    kind: "stream",
    stream,
    write(record: LogRecord, formatted: string) {
      try {
        const line = colored && render ? render(record, levelColor(record.level)) : formatted;
        stream.write(line + "\n");
      } catch (err) {
        process.stderr.write(`[tristream] Failed to write console log: ${String(err)}\n`);
      }
    },
    // 进程标准流不归我们所有，关闭时不 end
  };
}
