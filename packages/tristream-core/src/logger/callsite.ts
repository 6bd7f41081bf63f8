/**
 * Tristream Logger - 调用位置解析
 *
 * 解析 V8 堆栈文本，得到 [filename:lineno] 与函数名。
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

export interface CallSite {
  filename: string;
  lineno: number;
  funcName: string;
}

/** 无法定位时的占位值 */
export const UNKNOWN_SITE: CallSite = { filename: "<unknown>", lineno: -1, funcName: "<unknown>" };

// at fn (file:line:col) / at file:line:col
const FRAME_WITH_FN = /^\s*at (?:async )?(.+?) \((.+):(\d+):\d+\)$/;
const FRAME_BARE = /^\s*at (?:async )?(.+):(\d+):\d+$/;
// at Array.forEach (<anonymous>) / at async Promise.all (index 0) / at <anonymous>
const FRAME_NATIVE = /^\s*at (?:async )?(.+?)(?: \((.*)\))?$/;

function baseName(location: string): string {
  const file = location.startsWith("file://") ? fileURLToPath(location) : location;
  return path.basename(file);
}

/** 解析一行 "at ..." 帧；没有源码位置的内建帧行号为 -1 */
export function parseFrame(line: string): CallSite | null {
  const withFn = FRAME_WITH_FN.exec(line);
  if (withFn) {
    return { funcName: withFn[1], filename: baseName(withFn[2]), lineno: Number(withFn[3]) };
  }
  const bare = FRAME_BARE.exec(line);
  if (bare) {
    return { funcName: "<anonymous>", filename: baseName(bare[1]), lineno: Number(bare[2]) };
  }
  const native = FRAME_NATIVE.exec(line);
  if (native) {
    const location = native[2] ?? native[1];
    return { funcName: native[1], filename: location === "<anonymous>" ? location : "<native>", lineno: -1 };
  }
  return null;
}

/** 每个 "at" 行对应一项，内建帧也占位，下标即调用层数 */
export function parseStack(stack: string | undefined): CallSite[] {
  if (!stack) return [];
  const sites: CallSite[] = [];
  for (const line of stack.split("\n")) {
    const site = parseFrame(line);
    if (site) sites.push(site);
  }
  return sites;
}

/** 在所需层数之外多取的帧数 */
const STACK_HEADROOM = 8;

/**
 * 取调用方位置。skip = 0 为直接调用 captureCallSite 的函数，
 * 每加 1 向外跳过一层。
 */
export function captureCallSite(skip: number): CallSite {
  const limit = Error.stackTraceLimit;
  Error.stackTraceLimit = skip + STACK_HEADROOM;
  const holder: { stack?: string } = {};
  try {
    Error.captureStackTrace(holder, captureCallSite);
  } finally {
    Error.stackTraceLimit = limit;
  }
  return parseStack(holder.stack)[skip] ?? UNKNOWN_SITE;
}

/** 异常抛出处（其堆栈顶帧），不是记录它的位置 */
export function raisedSite(error: unknown): CallSite {
  if (!(error instanceof Error)) return UNKNOWN_SITE;
  // 跳过 JSON.parse 之类的内建帧，取第一个有源码位置的帧
  return parseStack(error.stack).find((site) => site.lineno >= 0) ?? UNKNOWN_SITE;
}
