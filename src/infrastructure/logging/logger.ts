/**
 * Operational logger.
 *
 * Console output is pretty-printed outside production; when a log file is
 * configured, the same records are appended to a size/time rotated file.
 */
import path from "path";
import pino from "pino";
import pretty from "pino-pretty";
import { createStream } from "rotating-file-stream";
import type { AppConfig } from "../../config";

export type Logger = pino.Logger;

export interface LoggerOptions {
  level: AppConfig["log"]["level"];
  pretty?: boolean;
  /** Write to stdout; defaults to true. */
  console?: boolean;
  file?: string | null;
  rotateSize?: string;
  rotateInterval?: string;
  maxFiles?: number;
}

export function createLogger(options: LoggerOptions): Logger {
  const streams: pino.StreamEntry[] = [];

  if (options.console ?? true) {
    streams.push({
      level: "trace",
      stream: options.pretty
        ? pretty({ colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" })
        : pino.destination(1),
    });
  }

  if (options.file) {
    streams.push({
      level: "trace",
      stream: createStream(path.basename(options.file), {
        path: path.dirname(path.resolve(options.file)),
        size: options.rotateSize ?? "10M",
        ...(options.rotateInterval ? { interval: options.rotateInterval } : {}),
        maxFiles: options.maxFiles ?? 5,
      }),
    });
  }

  return pino(
    {
      level: options.level,
      name: "task-list",
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    pino.multistream(streams)
  );
}

export function loggerFromConfig(config: AppConfig): Logger {
  return createLogger({
    level: config.log.level,
    pretty: config.env !== "production",
    file: config.log.file,
    rotateSize: config.log.rotateSize,
    rotateInterval: config.log.rotateInterval,
    maxFiles: config.log.maxFiles,
  });
}

/** Writable target for morgan, one access line per `info` record. */
export function httpLogStream(logger: Logger) {
  const http = logger.child({ component: "http" });
  return {
    write(line: string) {
      http.info(line.trim());
    },
  };
}
