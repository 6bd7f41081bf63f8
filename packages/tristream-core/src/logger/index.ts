/**
 * Tristream Logger 模块
 *
 * 三路日志路由，支持：
 * - ingress / output / fault 三个独立文件
 * - 按时间轮转、保留指定数量的历史文件
 * - output → stdout、fault → stderr 的控制台镜像
 * - 结构化异常报告与作用域关闭
 */

export { LogRouter, LogCallOptions, callOptions, withLogRouter, createLogRouterFromEnv } from "./router.js";
export { Sink } from "./sink.js";
export { loadRouterOptionsFromEnv, parseLogLevel, resolveRouterConfig, type ResolvedRouterConfig } from "./config.js";
export { createFileTransport, computeRollover, type FileTransport, type FileTransportOptions } from "./file-transport.js";
export { createConsoleTransport, type ConsoleTransport, type RecordRenderer } from "./console-transport.js";
export { DEFAULT_FORMAT, DEFAULT_DATE_FORMAT, formatDate, formatStack, type FieldDecorators } from "./format.js";
export type {
  LogLevel,
  LogRecord,
  LogTransport,
  LogRouterOptions,
  ExceptionReport,
  RotationPolicy,
  RotationWhen,
  SinkName,
} from "./types.js";
export { LOG_LEVEL_WEIGHT, LOG_LEVEL_NAME } from "./types.js";
