import {LogLevel, TimestampFormatCode, logFormats} from "@randao-election/logger";
import type {LogFormat} from "@randao-election/logger";
import {getNodeLogger} from "@randao-election/logger/node";
import type {LoggerNode, LoggerNodeOpts} from "@randao-election/logger/node";
import type {LogArgs} from "../options/logOptions.js";
import {YargsError} from "./errors.js";

/**
 * Setup a CLI logger, common for every command
 */
export function getCliLogger(args: LogArgs): LoggerNode {
  return getNodeLogger(parseLoggerArgs(args));
}

export function parseLoggerArgs(args: LogArgs): LoggerNodeOpts {
  return {
    level: parseLogLevel(args.logLevel),
    file:
      args.logFile !== undefined
        ? {
            filepath: args.logFile,
            level: parseLogLevel(args.logFileLevel),
            dailyRotate: args.logFileDailyRotate,
          }
        : undefined,
    module: args.logPrefix,
    format: args.logFormat !== undefined ? parseLogFormat(args.logFormat) : undefined,
    levelModule: args.logLevelModule && parseLogLevelModule(args.logLevelModule),
    timestampFormat: {
      format: args.logHideTimestamp ? TimestampFormatCode.Hidden : TimestampFormatCode.DateRegular,
    },
  };
}

function parseLogFormat(format: string): LogFormat {
  const logFormat = logFormats.find((f) => f === format);
  if (logFormat === undefined) {
    throw new YargsError(`Unknown log format '${format}'`);
  }
  return logFormat;
}

function parseLogLevel(level: string): LogLevel {
  const logLevel = Object.values(LogLevel).find((l) => l === level);
  if (logLevel === undefined) {
    throw new YargsError(`Unknown log level '${level}'`);
  }
  return logLevel;
}

function parseLogLevelModule(logLevelModuleArr: string[]): Record<string, LogLevel> {
  const levelModule: Record<string, LogLevel> = {};
  for (const logLevelModule of logLevelModuleArr) {
    const [module, levelStr] = logLevelModule.split("=");
    if (!module || levelStr === undefined) {
      throw new YargsError(`Invalid logLevelModule '${logLevelModule}', expected 'module=level'`);
    }
    levelModule[module] = parseLogLevel(levelStr);
  }
  return levelModule;
}
