/**
 * Tristream Logger - 文件输出 Transport
 *
 * 功能：
 * - 首次写入时才打开文件（未使用的 sink 不产生空文件）
 * - 同步追加写入，写入顺序即调用顺序
 * - 按时间轮转：S/M/H/D/MIDNIGHT/W0-W6，轮转后的文件名为 <file>.<时间后缀>
 * - 超过 backupCount 的旧文件在轮转时删除
 */

import fs from "node:fs";
import path from "node:path";
import { formatDate } from "./format.js";
import type { LogRecord, LogTransport, RotationPolicy } from "./types.js";

export interface FileTransportOptions {
  filePath: string;
  rotation: RotationPolicy;
  encoding: BufferEncoding;
  clock: () => Date;
}

export interface FileTransport extends LogTransport {
  readonly kind: "file";
  readonly filePath: string;
  /** 下一次轮转的时间点（毫秒） */
  readonly rolloverAt: number;
}

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

interface Schedule {
  /** 轮转周期（毫秒） */
  periodMs: number;
  /** 轮转文件后缀的日期模板 */
  suffix: string;
  /** 匹配后缀的正则，用于清理旧文件 */
  suffixPattern: RegExp;
}

function scheduleFor(rotation: RotationPolicy): Schedule {
  const { when, interval } = rotation;
  switch (when) {
    case "S":
      return { periodMs: SECOND * interval, suffix: "YYYY-MM-DD_HH-mm-ss", suffixPattern: /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}$/ };
    case "M":
      return { periodMs: MINUTE * interval, suffix: "YYYY-MM-DD_HH-mm", suffixPattern: /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}$/ };
    case "H":
      return { periodMs: HOUR * interval, suffix: "YYYY-MM-DD_HH", suffixPattern: /^\d{4}-\d{2}-\d{2}_\d{2}$/ };
    case "D":
    case "MIDNIGHT":
      return { periodMs: DAY * interval, suffix: "YYYY-MM-DD", suffixPattern: /^\d{4}-\d{2}-\d{2}$/ };
    default:
      // W0-W6
      return { periodMs: 7 * DAY * interval, suffix: "YYYY-MM-DD", suffixPattern: /^\d{4}-\d{2}-\d{2}$/ };
  }
}

/** 下一个午夜（本地或 UTC），再加 extraDays 天 */
function nextMidnight(fromMs: number, utc: boolean, extraDays: number): number {
  const d = new Date(fromMs);
  if (utc) {
    return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate() + 1 + extraDays);
  }
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + 1 + extraDays).getTime();
}

/** 从 baseMs 起计算第一次轮转时间 */
export function computeRollover(rotation: RotationPolicy, baseMs: number): number {
  const { when, interval, utc } = rotation;
  if (when === "MIDNIGHT") {
    return nextMidnight(baseMs, utc, interval - 1);
  }
  if (when.startsWith("W")) {
    const target = Number(when.slice(1));
    const d = new Date(baseMs);
    // 0 = 周一
    const today = ((utc ? d.getUTCDay() : d.getDay()) + 6) % 7;
    const daysToWait = today === target ? 0 : (target - today + 7) % 7;
    return nextMidnight(baseMs, utc, daysToWait);
  }
  return baseMs + scheduleFor(rotation).periodMs;
}

function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export function createFileTransport(opts: FileTransportOptions): FileTransport {
  const { filePath, rotation, encoding, clock } = opts;
  const schedule = scheduleFor(rotation);
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);

  let fd: number | null = null;
  let rolloverAt = computeRollover(rotation, initialBase());

  /** 文件已存在时以其 mtime 为起点，否则以当前时间为起点 */
  function initialBase(): number {
    try {
      return fs.statSync(filePath).mtimeMs;
    } catch {
      return clock().getTime();
    }
  }

  /** 轮转后的历史文件，按文件名（即时间）升序 */
  function listBackups(): string[] {
    const prefix = `${base}.`;
    return fs
      .readdirSync(dir)
      .filter((f) => f.startsWith(prefix) && schedule.suffixPattern.test(f.slice(prefix.length)))
      .sort();
  }

  function pruneBackups(): void {
    if (rotation.backupCount <= 0) return;
    const backups = listBackups();
    const excess = backups.length - rotation.backupCount;
    for (const f of backups.slice(0, Math.max(0, excess))) {
      fs.unlinkSync(path.join(dir, f));
    }
  }

  function closeHandle(): void {
    if (fd !== null) {
      const handle = fd;
      fd = null;
      fs.closeSync(handle);
    }
  }

  function doRollover(nowMs: number): void {
    closeHandle();
    const periodStart = new Date(rolloverAt - schedule.periodMs);
    const target = `${filePath}.${formatDate(periodStart, schedule.suffix, rotation.utc)}`;
    if (fs.existsSync(filePath)) {
      if (fs.existsSync(target)) fs.unlinkSync(target);
      fs.renameSync(filePath, target);
    }
    pruneBackups();

    let next = rolloverAt + schedule.periodMs;
    while (next <= nowMs) {
      next += schedule.periodMs;
    }
    rolloverAt = next;
  }

  /** 获取或打开文件句柄 */
  function getHandle(): number {
    if (fd === null) {
      ensureDir(dir);
      fd = fs.openSync(filePath, "a");
    }
    return fd;
  }

  return {
    kind: "file",
    filePath,
    get rolloverAt() {
      return rolloverAt;
    },
    write(_record: LogRecord, formatted: string) {
      try {
        const nowMs = clock().getTime();
        if (nowMs >= rolloverAt) {
          doRollover(nowMs);
        }
        const line = formatted.endsWith("\n") ? formatted : formatted + "\n";
        fs.writeSync(getHandle(), line, null, encoding);
      } catch (err) {
        process.stderr.write(`[tristream] Failed to write log file ${filePath}: ${String(err)}\n`);
      }
    },
    flush() {
      if (fd !== null) {
        fs.fsyncSync(fd);
      }
    },
    close() {
      closeHandle();
    },
  };
}
