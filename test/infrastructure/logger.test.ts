import fs from "fs";
import path from "path";
import pino from "pino";
import express from "express";
import request from "supertest";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createLogger, httpLogStream } from "../../src/infrastructure/logging/logger";
import SqliteTaskRepository from "../../src/infrastructure/repositories/sqliteTaskRepository";
import { initSchema } from "../../src/infrastructure/db/database";
import { createHealthController } from "../../src/interfaces/http/controllers/healthController";
import { tempDir } from "../helpers/testSetup";

type LogRecord = Record<string, unknown>;

function capture() {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: "trace" },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    }
  );
  return { logger, records };
}

let dir: string;
let cleanup: () => void;

beforeEach(() => {
  ({ dir, cleanup } = tempDir());
});

afterEach(() => cleanup());

describe("createLogger", () => {
  it("appends records to the log file", async () => {
    const file = path.join(dir, "task_tracker.log");
    const logger = createLogger({ level: "info", console: false, file });

    logger.info({ id: 3 }, "task added");
    logger.debug("below the level");

    await vi.waitFor(() => {
      expect(fs.readFileSync(file, "utf8")).toContain('"msg":"task added"');
    });
    const lines = fs.readFileSync(file, "utf8").trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: "info",
      name: "task-list",
      id: 3,
      msg: "task added",
    });
  });
});

describe("httpLogStream", () => {
  it("writes one trimmed info record per access line", () => {
    const { logger, records } = capture();
    httpLogStream(logger).write("GET / 200 1.234 ms - 512\n");
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: 30, component: "http", msg: "GET / 200 1.234 ms - 512" });
  });
});

describe("SqliteTaskRepository logging", () => {
  it("logs a successful insert at info", async () => {
    const dbPath = path.join(dir, "tasks.db");
    initSchema({ path: dbPath });
    const { logger, records } = capture();

    await new SqliteTaskRepository({ path: dbPath }, logger).create({ description: "Buy milk" });

    expect(records).toContainEqual(
      expect.objectContaining({
        level: 30,
        component: "task-repository",
        msg: "task added",
        id: 1,
        description: "Buy milk",
      })
    );
  });

  it("logs a failed operation at error before rethrowing", async () => {
    const { logger, records } = capture();
    const repo = new SqliteTaskRepository({ path: path.join(dir, "missing", "tasks.db") }, logger);

    await expect(repo.list()).rejects.toMatchObject({ code: "STORAGE_ERROR" });

    const failure = records.find((r) => r.msg === "storage operation failed");
    expect(failure).toMatchObject({ level: 50, component: "task-repository", operation: "list" });
    expect(failure?.err).toBeDefined();
  });
});

describe("health check logging", () => {
  it("logs why the storage check failed", async () => {
    const { logger, records } = capture();
    const app = express();
    app.get("/health", createHealthController(() => Promise.reject(new Error("disk gone")), logger));

    await request(app).get("/health").expect(503);

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: 40,
      component: "health",
      msg: "storage health check failed",
      err: expect.objectContaining({ message: "disk gone" }),
    });
  });
});
