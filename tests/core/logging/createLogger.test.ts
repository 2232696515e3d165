import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { bindLogger, createLogger, type LogEntry } from "../../../core/logging/createLogger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns no logger in none mode", () => {
    expect(createLogger("none")).toBeUndefined();
  });

  it("writes JSON lines to the console, filtered by level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("console", { level: "warn" });

    logger?.({ level: "info", msg: "hidden" });
    logger?.({ level: "warn", msg: "shown", time: 1, status: 401 });
    logger?.({ level: "error", msg: "failed", time: 2, err: new Error("boom") });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('{"time":1,"level":"warn","msg":"shown","status":401}');
    expect(error).toHaveBeenCalledWith(
      '{"time":2,"level":"error","msg":"failed","err":{"name":"Error","message":"boom"}}'
    );
  });

  it("defaults to info", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = createLogger("console");

    logger?.({ level: "debug", msg: "hidden" });
    logger?.({ level: "info", msg: "shown", time: 5 });

    expect(log).toHaveBeenCalledTimes(1);
  });

  it("appends to a log file, creating its directory", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "linkgate-log-"));
    const filePath = path.join(dir, "nested", "gate.log");
    const logger = createLogger("file", { filePath, level: "debug" });

    logger?.({ level: "debug", msg: "one", time: 1 });
    logger?.({ level: "info", msg: "two", time: 2 });

    await vi.waitFor(() => {
      expect(fs.readFileSync(filePath, "utf8")).toBe(
        '{"time":1,"level":"debug","msg":"one"}\n{"time":2,"level":"info","msg":"two"}\n'
      );
    });
  });

  it("disables the file logger without a path", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(createLogger("file")).toBeUndefined();
  });
});

describe("bindLogger", () => {
  it("merges bound fields under the entry", () => {
    const entries: LogEntry[] = [];
    const logger = bindLogger((entry) => entries.push(entry), { requestId: "r1", path: "/bound" });

    logger?.({ level: "info", msg: "done", path: "/override" });

    expect(entries).toEqual([{ requestId: "r1", path: "/override", level: "info", msg: "done" }]);
  });

  it("stays undefined without a logger", () => {
    expect(bindLogger(undefined, { requestId: "r1" })).toBeUndefined();
  });
});
