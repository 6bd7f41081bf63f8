import { describe, it, expect, vi, afterEach } from "vitest";
import { Sink } from "./sink.js";
import type { LogRecord, LogTransport } from "./types.js";

function record(level: LogRecord["level"], message: string): LogRecord {
    return {
        timestamp: new Date(2026, 0, 2),
        level,
        sink: "output",
        message,
        filename: "x.ts",
        lineno: 1,
        funcName: "x",
    };
}

type Recorder = LogTransport & { lines: string[]; closed: boolean };

function recorder(): Recorder {
    const t: Recorder = {
        kind: "stream",
        lines: [],
        closed: false,
        write(_r, formatted) {
            t.lines.push(formatted);
        },
        close() {
            t.closed = true;
        },
    };
    return t;
}

describe("Sink", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("should format once and write to every transport at or above its level", () => {
        const format = vi.fn((r: LogRecord) => `${r.level}:${r.message}`);
        const sink = new Sink("output", "/tmp/x.log", "info", format);
        const a = recorder();
        const b = recorder();
        sink.addTransport(a);
        sink.addTransport(b);

        sink.emit(record("debug", "hidden"));
        sink.emit(record("warning", "shown"));

        expect(format).toHaveBeenCalledTimes(1);
        expect(a.lines).toEqual(["warning:shown"]);
        expect(b.lines).toEqual(["warning:shown"]);
    });

    it("should keep closing the remaining transports when one fails", () => {
        const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
        const sink = new Sink("fault", "/tmp/x.log", "debug", (r) => r.message);
        const broken: LogTransport = {
            kind: "file",
            write() {},
            flush() {
                throw new Error("flush failed");
            },
            close() {
                throw new Error("close failed");
            },
        };
        const healthy = recorder();
        sink.addTransport(broken);
        sink.addTransport(healthy);

        expect(() => sink.close()).not.toThrow();
        expect(sink.handlerCount).toBe(0);
        expect(healthy.closed).toBe(true);
        expect(stderr).toHaveBeenCalledTimes(2);
        expect(stderr).toHaveBeenCalledWith("[tristream] Failed to flush fault transport: Error: flush failed\n");
        expect(stderr).toHaveBeenCalledWith("[tristream] Failed to close fault transport: Error: close failed\n");
    });
});
