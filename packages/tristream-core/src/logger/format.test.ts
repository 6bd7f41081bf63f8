import { describe, it, expect } from "vitest";
import {
    DEFAULT_DATE_FORMAT,
    DEFAULT_FORMAT,
    errorKind,
    formatDate,
    formatRecord,
    formatStack,
    interpolate,
    renderTemplate,
    stringifyMessage,
} from "./format.js";
import type { LogRecord } from "./types.js";

class KeyError extends Error {}

describe("formatDate", () => {
    it("should render all tokens in local time", () => {
        const d = new Date(2026, 0, 2, 3, 4, 5, 6);
        expect(formatDate(d, "YYYY-MM-DD HH:mm:ss.SSS")).toBe("2026-01-02 03:04:05.006");
    });

    it("should render in UTC when asked", () => {
        const d = new Date(Date.UTC(2026, 10, 30, 23, 59, 1));
        expect(formatDate(d, "YYYY-MM-DD_HH-mm-ss", true)).toBe("2026-11-30_23-59-01");
    });
});

describe("renderTemplate", () => {
    it("should pad fields with a width and keep unknown placeholders", () => {
        const out = renderTemplate("[{levelname:8}] {message} {missing}", { levelname: "INFO", message: "hi" });
        expect(out).toBe("[INFO    ] hi {missing}");
    });
});

describe("stringifyMessage / interpolate", () => {
    it("should keep strings and JSON-encode structured values", () => {
        expect(stringifyMessage("plain")).toBe("plain");
        expect(stringifyMessage({ a: 1, b: [true] })).toBe('{"a":1,"b":[true]}');
    });

    it("should fall back to inspect when JSON cannot represent the value", () => {
        const o: Record<string, unknown> = {};
        o.self = o;
        expect(stringifyMessage(o)).toBe("<ref *1> { self: [Circular *1] }");
        expect(stringifyMessage(undefined)).toBe("undefined");
    });

    it("should only apply printf substitution when args are given", () => {
        expect(interpolate("user %s has %d items", ["ann", 3])).toBe("user ann has 3 items");
        expect(interpolate("100%s", [])).toBe("100%s");
    });
});

describe("errorKind / formatStack", () => {
    it("should use the runtime class name", () => {
        expect(errorKind(new KeyError("x"))).toBe("KeyError");
        expect(errorKind(new TypeError("x"))).toBe("TypeError");
        expect(errorKind("x")).toBe("String");
        expect(errorKind(null)).toBe("null");
        expect(errorKind(undefined)).toBe("undefined");
    });

    it("should start the stack block with kind and message, then frames", () => {
        const block = formatStack(new KeyError("boom"));
        const lines = block.split("\n");
        expect(lines[0]).toBe("KeyError: boom");
        expect(lines.length).toBeGreaterThan(1);
        expect(lines.slice(1).every((l) => /^\s+at /.test(l))).toBe(true);
    });

    it("should produce only the header for values without a stack", () => {
        expect(formatStack("plain")).toBe("String: plain");
    });
});

describe("formatRecord", () => {
    const record: LogRecord = {
        timestamp: new Date(2026, 0, 2, 3, 4, 5, 6),
        level: "info",
        sink: "output",
        message: "hello",
        filename: "app.ts",
        lineno: 12,
        funcName: "main",
    };

    it("should render the default line layout", () => {
        expect(formatRecord(record, DEFAULT_FORMAT, DEFAULT_DATE_FORMAT)).toBe(
            "2026-01-02 03:04:05.006 - INFO     [app.ts:12] hello",
        );
    });

    it("should append the stack block on the following lines", () => {
        const out = formatRecord({ ...record, stack: "KeyError: x" }, "{name} {funcName} {message}", DEFAULT_DATE_FORMAT);
        expect(out).toBe("output main hello\nKeyError: x");
    });
});
