/**
 * Tristream Logger - Sink
 *
 * 一路独立的日志目的地：一个文件 Transport，外加可选的控制台镜像。
 * 由 LogRouter 独占持有，不做全局按名查找。
 */

import type { LogLevel, LogRecord, LogTransport, SinkName } from "./types.js";
import { LOG_LEVEL_WEIGHT } from "./types.js";

export class Sink {
  private transports: LogTransport[] = [];
  private readonly levelWeight: number;

  constructor(
    readonly name: SinkName,
    readonly filePath: string,
    readonly level: LogLevel,
    private readonly format: (record: LogRecord) => string,
  ) {
    this.levelWeight = LOG_LEVEL_WEIGHT[level];
  }

  get handlers(): readonly LogTransport[] {
    return this.transports;
  }

  get handlerCount(): number {
    return this.transports.length;
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  isEnabledFor(level: LogLevel): boolean {
    return LOG_LEVEL_WEIGHT[level] >= this.levelWeight;
  }

  emit(record: LogRecord): void {
    if (!this.isEnabledFor(record.level) || this.transports.length === 0) return;
    const formatted = this.format(record);
    for (const t of this.transports) {
      t.write(record, formatted);
    }
  }

  /** 逐个 flush + close 后摘除；单个失败不影响其余 */
  close(): void {
    for (const t of [...this.transports]) {
      try {
        t.flush?.();
      } catch (err) {
        process.stderr.write(`[tristream] Failed to flush ${this.name} transport: ${String(err)}\n`);
      }
      try {
        t.close?.();
      } catch (err) {
        process.stderr.write(`[tristream] Failed to close ${this.name} transport: ${String(err)}\n`);
      }
      this.transports = this.transports.filter((x) => x !== t);
    }
  }
}
