import path from "node:path";
import DailyRotateFile from "winston-daily-rotate-file";
import TransportStream from "winston-transport";
// We want to keep `winston` export as it's more readable and easier to understand
/* eslint-disable import/no-named-as-default-member */
import winston from "winston";
import type {Logger as Winston} from "winston";
import {Logger, LogLevel, TimestampFormat} from "./interface.js";
import {ConsoleDynamicLevel} from "./utils/consoleTransport.js";
import {WinstonLogger} from "./winston.js";

const DATE_PATTERN = "YYYY-MM-DD";

export type LoggerNodeOpts = {
  level: LogLevel;
  /**
   * Enable file output transport if set
   */
  file?: {
    filepath: string;
    /**
     * Log level for file output transport
     */
    level: LogLevel;
    /**
     * Number of daily rotated files to keep, rotation is disabled if 0 or unset
     */
    dailyRotate?: number;
  };
  /**
   * Module prefix for all logs
   */
  module?: string;
  /**
   * Rendering format for logs, defaults to "human"
   */
  format?: "human" | "json";
  /**
   * Set specific log levels by module
   */
  levelModule?: Record<string, LogLevel>;
  timestampFormat?: TimestampFormat;
};

export type LoggerNodeChildOpts = {
  module?: string;
};

export type LoggerNode = Logger & {
  toOpts(): LoggerNodeOpts;
  child(opts: LoggerNodeChildOpts): LoggerNode;
};

/**
 * Setup a CLI logger writing to the console and, optionally, to a file
 */
export function getNodeLogger(opts: LoggerNodeOpts): LoggerNode {
  return WinstonLoggerNode.fromNewTransports(opts);
}

function getNodeLoggerTransports(opts: LoggerNodeOpts): winston.transport[] {
  const consoleTransport = new ConsoleDynamicLevel({
    // Set defaultLevel, not level for dynamic level setting of ConsoleDynamicLevel
    defaultLevel: opts.level,
  });

  if (opts.levelModule) {
    for (const [module, level] of Object.entries(opts.levelModule)) {
      consoleTransport.setModuleLevel(module, level);
    }
  }

  const transports: TransportStream[] = [consoleTransport];

  if (opts.file) {
    const filename = opts.file.filepath;

    // `--logFileDailyRotate` -> enable daily rotate with default value
    // `--logFileDailyRotate 10` -> set daily rotate to custom value 10
    // `--logFileDailyRotate 0` -> disable daily rotate and accumulate in same file
    const enableDailyRotate = opts.file.dailyRotate != null && opts.file.dailyRotate > 0;

    transports.push(
      enableDailyRotate
        ? new DailyRotateFile({
            level: opts.file.level,
            //insert the date pattern in filename before the file extension.
            filename: filename.replace(/\.(?=[^.]*$)|$/, "-%DATE%$&"),
            datePattern: DATE_PATTERN,
            maxFiles: opts.file.dailyRotate,
            auditFile: path.join(path.dirname(filename), ".log_rotate_audit.json"),
          })
        : new winston.transports.File({
            level: opts.file.level,
            filename: filename,
          })
    );
  }

  return transports;
}

export class WinstonLoggerNode extends WinstonLogger implements LoggerNode {
  constructor(
    winston: Winston,
    private readonly opts: LoggerNodeOpts
  ) {
    super(winston);
  }

  static fromOpts(opts: LoggerNodeOpts, transports: winston.transport[]): WinstonLoggerNode {
    return new WinstonLoggerNode(WinstonLogger.createWinstonInstance(opts, transports), opts);
  }

  static fromNewTransports(opts: LoggerNodeOpts): WinstonLoggerNode {
    return WinstonLoggerNode.fromOpts(opts, getNodeLoggerTransports(opts));
  }

  child(opts: LoggerNodeChildOpts): LoggerNode {
    const child = this.childWinston(opts.module);
    return new WinstonLoggerNode(child.winston, {...this.opts, module: child.module});
  }

  toOpts(): LoggerNodeOpts {
    return this.opts;
  }
}
