/**
 * Tristream Logger - 类型定义
 *
 * 三路输出：ingress（输入事件）、output（debug/info/warning）、fault（error/critical），
 * 每路一个按时间轮转的文件，output/fault 可选镜像到控制台。
 */

export type LogLevel = "debug" | "info" | "warning" | "error" | "critical";

/** 日志级别权重，用于比较 */
export const LOG_LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50,
};

export const LOG_LEVEL_NAME: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warning: "WARNING",
  error: "ERROR",
  critical: "CRITICAL",
};

export type SinkName = "ingress" | "output" | "fault";

/** 轮转触发方式，W0 = 周一 … W6 = 周日 */
export type RotationWhen = "S" | "M" | "H" | "D" | "MIDNIGHT" | "W0" | "W1" | "W2" | "W3" | "W4" | "W5" | "W6";

export interface RotationPolicy {
  when: RotationWhen;
  interval: number;
  /** 保留的历史文件数，0 表示全部保留 */
  backupCount: number;
  utc: boolean;
}

/** 单条日志记录，写出后即丢弃 */
export interface LogRecord {
  timestamp: Date;
  level: LogLevel;
  sink: SinkName;
  message: string;
  filename: string;
  lineno: number;
  funcName: string;
  /** 附加的异常堆栈块 */
  stack?: string;
}

/** Transport 接口：输出日志到某个目标 */
export interface LogTransport {
  readonly kind: "file" | "stream";
  write(record: LogRecord, formatted: string): void;
  flush?(): void;
  /** 关闭/清理资源（如关闭文件句柄） */
  close?(): void;
}

/** logError 返回并写入 fault 的结构化异常报告 */
export interface ExceptionReport {
  exception_type: string;
  exception_message: string;
  filename: string;
  lineno: number;
  function: string;
  timestamp: string;
  traceback: string;
}

/** LogRouter 配置 */
export interface LogRouterOptions {
  /** 日志目录，不存在时递归创建 */
  dir?: string;
  /** 三个文件的前缀：<name>_stdin.log / <name>_stdout.log / <name>_error.log */
  name?: string;
  /** 最低输出级别，大小写不敏感，无法识别时回退为 debug */
  level?: string;
  when?: string;
  interval?: number;
  backupCount?: number;
  utc?: boolean;
  /** 是否把 output/fault 镜像到 stdout/stderr */
  enableConsole?: boolean;
  format?: string;
  dateFormat?: string;
  encoding?: string;
  consoleStreams?: {
    output?: NodeJS.WritableStream;
    fault?: NodeJS.WritableStream;
  };
  clock?: () => Date;
}
