/**
 * Tristream Logger - 配置
 *
 * 负责 LogRouter 选项的默认值、zod 校验，以及从环境变量加载。
 */

import path from "node:path";
import { z } from "zod";
import { DEFAULT_DATE_FORMAT, DEFAULT_FORMAT } from "./format.js";
import type { LogLevel, LogRouterOptions, RotationPolicy, RotationWhen } from "./types.js";
import { LOG_LEVEL_WEIGHT } from "./types.js";

const DEFAULT_LOG_DIR = "../logs";
const DEFAULT_LOG_NAME = "project";
const DEFAULT_WHEN = "midnight";
const DEFAULT_INTERVAL = 1;
const DEFAULT_BACKUP_COUNT = 7;
const DEFAULT_ENCODING = "utf-8";

const ROTATION_WHEN = ["S", "M", "H", "D", "MIDNIGHT", "W0", "W1", "W2", "W3", "W4", "W5", "W6"] as const satisfies readonly RotationWhen[];

// ============================================================================
// Zod 验证 Schema
// ============================================================================

const RouterConfigSchema = z.object({
  dir: z.string().min(1, "日志目录不能为空").default(DEFAULT_LOG_DIR),
  name: z.string().min(1, "日志名称不能为空").default(DEFAULT_LOG_NAME),
  when: z
    .string()
    .default(DEFAULT_WHEN)
    .transform((s) => s.toUpperCase())
    .pipe(z.enum(ROTATION_WHEN, { errorMap: () => ({ message: "必须是 S/M/H/D/MIDNIGHT/W0-W6 之一" }) })),
  interval: z.number().int().min(1).default(DEFAULT_INTERVAL),
  backupCount: z.number().int().min(0).default(DEFAULT_BACKUP_COUNT),
  utc: z.boolean().default(false),
  enableConsole: z.boolean().default(false),
  format: z.string().default(DEFAULT_FORMAT),
  dateFormat: z.string().default(DEFAULT_DATE_FORMAT),
  encoding: z
    .string()
    .default(DEFAULT_ENCODING)
    .refine((s): s is BufferEncoding => Buffer.isEncoding(s), { message: "不支持的编码" }),
});

export interface ResolvedRouterConfig {
  dir: string;
  name: string;
  level: LogLevel;
  rotation: RotationPolicy;
  enableConsole: boolean;
  format: string;
  dateFormat: string;
  encoding: BufferEncoding;
}

/** 级别名大小写不敏感，无法识别时回退为 debug */
export function parseLogLevel(level: string | undefined): LogLevel {
  const key = (level ?? "debug").toLowerCase();
  return isLogLevel(key) ? key : "debug";
}

function isLogLevel(s: string): s is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_WEIGHT, s);
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `  - ${e.path.join(".")}: ${e.message}`).join("\n");
}

/** 校验并补全默认值；目录解析为绝对路径 */
export function resolveRouterConfig(options: LogRouterOptions): ResolvedRouterConfig {
  const result = RouterConfigSchema.safeParse({
    dir: options.dir,
    name: options.name,
    when: options.when,
    interval: options.interval,
    backupCount: options.backupCount,
    utc: options.utc,
    enableConsole: options.enableConsole,
    format: options.format,
    dateFormat: options.dateFormat,
    encoding: options.encoding,
  });
  if (!result.success) {
    throw new Error(`无效的日志配置:\n${formatIssues(result.error)}`);
  }
  const cfg = result.data;
  return {
    dir: path.resolve(cfg.dir),
    name: cfg.name,
    level: parseLogLevel(options.level),
    rotation: {
      when: cfg.when,
      interval: cfg.interval,
      backupCount: cfg.backupCount,
      utc: cfg.utc,
    },
    enableConsole: cfg.enableConsole,
    format: cfg.format,
    dateFormat: cfg.dateFormat,
    encoding: cfg.encoding,
  };
}

// ============================================================================
// 环境变量
// ============================================================================

const integerString = z.string().regex(/^\d+$/, "必须是整数").transform(Number);
const booleanString = z.enum(["true", "false"]).transform((v) => v === "true");

const EnvSchema = z.object({
  TRISTREAM_LOG_DIR: z.string().optional(),
  TRISTREAM_LOG_NAME: z.string().optional(),
  TRISTREAM_LOG_LEVEL: z.string().optional(),
  TRISTREAM_LOG_WHEN: z.string().optional(),
  TRISTREAM_LOG_INTERVAL: integerString.optional(),
  TRISTREAM_LOG_BACKUP_COUNT: integerString.optional(),
  TRISTREAM_LOG_UTC: booleanString.optional(),
  TRISTREAM_LOG_CONSOLE: booleanString.optional(),
  TRISTREAM_LOG_FORMAT: z.string().optional(),
  TRISTREAM_LOG_DATE_FORMAT: z.string().optional(),
  TRISTREAM_LOG_ENCODING: z.string().optional(),
});

/** 从环境变量读取 LogRouter 选项，未设置（或为空）的变量保持默认 */
export function loadRouterOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LogRouterOptions {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("TRISTREAM_LOG_") && value !== undefined && value !== ""),
  );
  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new Error(`日志环境变量验证失败:\n${formatIssues(result.error)}`);
  }
  const e = result.data;
  return {
    dir: e.TRISTREAM_LOG_DIR,
    name: e.TRISTREAM_LOG_NAME,
    level: e.TRISTREAM_LOG_LEVEL,
    when: e.TRISTREAM_LOG_WHEN,
    interval: e.TRISTREAM_LOG_INTERVAL,
    backupCount: e.TRISTREAM_LOG_BACKUP_COUNT,
    utc: e.TRISTREAM_LOG_UTC,
    enableConsole: e.TRISTREAM_LOG_CONSOLE,
    format: e.TRISTREAM_LOG_FORMAT,
    dateFormat: e.TRISTREAM_LOG_DATE_FORMAT,
    encoding: e.TRISTREAM_LOG_ENCODING,
  };
}
