/**
 * Tristream Logger - LogRouter
 *
 * 按语义级别把每次调用路由到三路 Sink 之一：
 * - debug / info / warning → output（<name>_stdout.log，可镜像到 stdout）
 * - error / critical / exception / logError → fault（<name>_error.log，可镜像到 stderr）
 * - ingress → ingress（<name>_stdin.log，固定 INFO，不镜像）
 */

import fs from "node:fs";
import path from "node:path";
import { captureCallSite, raisedSite } from "./callsite.js";
import { createConsoleTransport } from "./console-transport.js";
import { loadRouterOptionsFromEnv, resolveRouterConfig } from "./config.js";
import { createFileTransport } from "./file-transport.js";
import { errorKind, errorMessage, formatDate, formatRecord, formatStack, interpolate } from "./format.js";
import type { FieldDecorators } from "./format.js";
import { Sink } from "./sink.js";
import type { ExceptionReport, LogLevel, LogRecord, LogRouterOptions, SinkName } from "./types.js";

/** dispatch 自身占用的栈帧数 */
const INTERNAL_FRAMES = 1;

const SINK_FILE_SUFFIX: Record<SinkName, string> = {
  ingress: "stdin",
  output: "stdout",
  fault: "error",
};

/**
 * 单次调用的附加选项，作为最后一个参数传入，不参与插值。
 *
 * @example
 * log.error("retry %d failed", attempt, callOptions({ exc: err, stackLevel: 2 }));
 */
export class LogCallOptions {
  constructor(
    /** 需要附加堆栈的异常；undefined 表示不附加（exc 为 null/undefined 时也不附加） */
    readonly exc: { value: unknown } | undefined,
    /** 向外跳过的调用层数，1 = 直接调用方 */
    readonly stackLevel: number,
  ) {}
}

export function callOptions(opts: { exc?: unknown; stackLevel?: number }): LogCallOptions {
  const exc = opts.exc === undefined || opts.exc === null ? undefined : { value: opts.exc };
  return new LogCallOptions(exc, Math.max(1, Math.floor(opts.stackLevel ?? 1)));
}

const DEFAULT_CALL_OPTIONS = new LogCallOptions(undefined, 1);

function splitArgs(args: readonly unknown[]): { rest: readonly unknown[]; call: LogCallOptions } {
  const last = args[args.length - 1];
  if (last instanceof LogCallOptions) {
    return { rest: args.slice(0, -1), call: last };
  }
  return { rest: args, call: DEFAULT_CALL_OPTIONS };
}

export class LogRouter {
  readonly dir: string;
  readonly name: string;
  readonly level: LogLevel;
  readonly sinks: Readonly<Record<SinkName, Sink>>;

  private readonly clock: () => Date;
  private closed = false;

  constructor(options: LogRouterOptions = {}) {
    const cfg = resolveRouterConfig(options);
    this.dir = cfg.dir;
    this.name = cfg.name;
    this.level = cfg.level;
    this.clock = options.clock ?? (() => new Date());

    // 目录创建失败直接抛给调用方
    fs.mkdirSync(cfg.dir, { recursive: true });

    const format = (record: LogRecord, decorators?: FieldDecorators): string =>
      formatRecord(record, cfg.format, cfg.dateFormat, decorators);
    const build = (sinkName: SinkName, mirror: NodeJS.WritableStream | undefined): Sink => {
      const filePath = path.join(cfg.dir, `${cfg.name}_${SINK_FILE_SUFFIX[sinkName]}.log`);
      const sink = new Sink(sinkName, filePath, cfg.level, format);
      sink.addTransport(
        createFileTransport({ filePath, rotation: cfg.rotation, encoding: cfg.encoding, clock: this.clock }),
      );
      if (mirror) {
        sink.addTransport(createConsoleTransport(mirror, format));
      }
      return sink;
    };

    const streams = options.consoleStreams ?? {};
    this.sinks = {
      ingress: build("ingress", undefined),
      output: build("output", cfg.enableConsole ? (streams.output ?? process.stdout) : undefined),
      fault: build("fault", cfg.enableConsole ? (streams.fault ?? process.stderr) : undefined),
    };
  }

  get ingressPath(): string {
    return this.sinks.ingress.filePath;
  }

  get outputPath(): string {
    return this.sinks.output.filePath;
  }

  get faultPath(): string {
    return this.sinks.fault.filePath;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ── output ──

  debug(message: unknown, ...args: unknown[]): void {
    this.dispatch("output", "debug", message, args);
  }

  info(message: unknown, ...args: unknown[]): void {
    this.dispatch("output", "info", message, args);
  }

  warning(message: unknown, ...args: unknown[]): void {
    this.dispatch("output", "warning", message, args);
  }

  // ── fault ──

  error(message: unknown, ...args: unknown[]): void {
    this.dispatch("fault", "error", message, args);
  }

  critical(message: unknown, ...args: unknown[]): void {
    this.dispatch("fault", "critical", message, args);
  }

  /** 以 ERROR 写入 fault，并强制附加 error 的堆栈 */
  exception(error: unknown, message: unknown, ...args: unknown[]): void {
    this.dispatch("fault", "error", message, args, { value: error });
  }

  // ── ingress ──

  /** 记录输入事件，固定为 INFO */
  ingress(message: unknown, ...args: unknown[]): void {
    this.dispatch("ingress", "info", message, args);
  }

  /**
   * 生成结构化异常报告，写入 fault 并返回。
   * 位置字段取自异常抛出处；异常没有可解析的堆栈时为 "<unknown>" / -1。
   */
  logError(error: unknown): ExceptionReport {
    const site = raisedSite(error);
    const report: ExceptionReport = {
      exception_type: errorKind(error),
      exception_message: errorMessage(error),
      filename: site.filename,
      lineno: site.lineno,
      function: site.funcName,
      timestamp: formatDate(this.clock(), "YYYY-MM-DD HH:mm:ss"),
      traceback: formatStack(error),
    };
    this.dispatch("fault", "error", report, [], { value: error });
    return report;
  }

  /** flush 并关闭全部 Transport；可重复调用 */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const sink of Object.values(this.sinks)) {
      sink.close();
    }
  }

  /**
   * 作用域用法：执行 fn(this)，无论正常返回、抛错还是 Promise 结束都会 close。
   */
  scope<T>(fn: (router: LogRouter) => Promise<T>): Promise<T>;
  scope<T>(fn: (router: LogRouter) => T): T;
  scope<T>(fn: (router: LogRouter) => T | Promise<T>): T | Promise<T> {
    let deferred = false;
    try {
      const result = fn(this);
      if (result instanceof Promise) {
        deferred = true;
        return result.finally(() => this.close());
      }
      return result;
    } finally {
      if (!deferred) this.close();
    }
  }

  private dispatch(
    sinkName: SinkName,
    level: LogLevel,
    message: unknown,
    args: readonly unknown[],
    forcedExc?: { value: unknown },
  ): void {
    const sink = this.sinks[sinkName];
    if (sink.handlerCount === 0 || !sink.isEnabledFor(level)) return;

    const { rest, call } = splitArgs(args);
    const site = captureCallSite(INTERNAL_FRAMES + call.stackLevel);
    const exc = forcedExc ?? call.exc;

    sink.emit({
      timestamp: this.clock(),
      level,
      sink: sinkName,
      message: interpolate(message, rest),
      filename: site.filename,
      lineno: site.lineno,
      funcName: site.funcName,
      stack: exc ? formatStack(exc.value) : undefined,
    });
  }
}

/** 创建 LogRouter 并在作用域结束时关闭 */
export function withLogRouter<T>(options: LogRouterOptions, fn: (router: LogRouter) => Promise<T>): Promise<T>;
export function withLogRouter<T>(options: LogRouterOptions, fn: (router: LogRouter) => T): T;
export function withLogRouter<T>(
  options: LogRouterOptions,
  fn: (router: LogRouter) => T | Promise<T>,
): T | Promise<T> {
  return new LogRouter(options).scope(fn);
}

/** 从环境变量创建 LogRouter；overrides 优先于环境变量 */
export function createLogRouterFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: LogRouterOptions = {},
): LogRouter {
  return new LogRouter({ ...loadRouterOptionsFromEnv(env), ...overrides });
}
