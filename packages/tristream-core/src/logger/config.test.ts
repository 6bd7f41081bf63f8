import { describe, it, expect } from "vitest";
import path from "node:path";
import { loadRouterOptionsFromEnv, parseLogLevel, resolveRouterConfig } from "./config.js";

describe("resolveRouterConfig", () => {
    it("should fill in defaults", () => {
        expect(resolveRouterConfig({})).toEqual({
            dir: path.resolve("../logs"),
            name: "project",
            level: "debug",
            rotation: { when: "MIDNIGHT", interval: 1, backupCount: 7, utc: false },
            enableConsole: false,
            format: "{asctime}.{msecs} - {levelname:8} [{filename}:{lineno}] {message}",
            dateFormat: "YYYY-MM-DD HH:mm:ss",
            encoding: "utf-8",
        });
    });

    it("should accept the rotation trigger in any case", () => {
        expect(resolveRouterConfig({ when: "w3" }).rotation.when).toBe("W3");
        expect(resolveRouterConfig({ when: "h", interval: 6 }).rotation).toEqual({
            when: "H",
            interval: 6,
            backupCount: 7,
            utc: false,
        });
    });

    it("should list every invalid option", () => {
        expect(() => resolveRouterConfig({ backupCount: -1, encoding: "klingon" })).toThrow(
            /无效的日志配置:\n {2}- backupCount: .+\n {2}- encoding: 不支持的编码/,
        );
    });
});

describe("parseLogLevel", () => {
    it("should be case-insensitive and fall back to debug", () => {
        expect(parseLogLevel("ERROR")).toBe("error");
        expect(parseLogLevel("Critical")).toBe("critical");
        expect(parseLogLevel("verbose")).toBe("debug");
        expect(parseLogLevel(undefined)).toBe("debug");
    });
});

describe("loadRouterOptionsFromEnv", () => {
    it("should map prefixed variables to options", () => {
        const opts = loadRouterOptionsFromEnv({
            TRISTREAM_LOG_DIR: "/var/log/app",
            TRISTREAM_LOG_INTERVAL: "3",
            TRISTREAM_LOG_BACKUP_COUNT: "0",
            TRISTREAM_LOG_CONSOLE: "true",
            TRISTREAM_LOG_UTC: "false",
            TRISTREAM_LOG_LEVEL: "warning",
            TRISTREAM_LOG_NAME: "",
            HOME: "/root",
        });
        expect(opts).toEqual({
            dir: "/var/log/app",
            interval: 3,
            backupCount: 0,
            enableConsole: true,
            utc: false,
            level: "warning",
        });
    });

    it("should reject malformed numbers and booleans", () => {
        expect(() => loadRouterOptionsFromEnv({ TRISTREAM_LOG_INTERVAL: "abc" })).toThrow(
            /日志环境变量验证失败:\n {2}- TRISTREAM_LOG_INTERVAL: 必须是整数/,
        );
        expect(() => loadRouterOptionsFromEnv({ TRISTREAM_LOG_CONSOLE: "yes" })).toThrow(/ {2}- TRISTREAM_LOG_CONSOLE: /);
    });
});
