import {describe, it, expect} from "vitest";
import {LogLevel, TimestampFormatCode} from "@randao-election/logger";
import {parseLoggerArgs} from "../../../src/util/logger.js";
import type {LogArgs} from "../../../src/options/index.js";

describe("util / logger", () => {
  const defaultArgs: LogArgs = {logLevel: "info", logFileLevel: "debug", logFileDailyRotate: 0};

  it("parses the default log options", () => {
    expect(parseLoggerArgs(defaultArgs)).toEqual({
      level: LogLevel.info,
      file: undefined,
      module: undefined,
      format: undefined,
      levelModule: undefined,
      timestampFormat: {format: TimestampFormatCode.DateRegular},
    });
  });

  it("parses file, format and module levels", () => {
    expect(
      parseLoggerArgs({
        ...defaultArgs,
        logLevel: "warn",
        logFile: "/tmp/election.log",
        logFileDailyRotate: 3,
        logFormat: "json",
        logPrefix: "run1",
        logLevelModule: ["replay=debug", "committee=error"],
        logHideTimestamp: true,
      })
    ).toEqual({
      level: LogLevel.warn,
      file: {filepath: "/tmp/election.log", level: LogLevel.debug, dailyRotate: 3},
      module: "run1",
      format: "json",
      levelModule: {replay: LogLevel.debug, committee: LogLevel.error},
      timestampFormat: {format: TimestampFormatCode.Hidden},
    });
  });

  it("rejects unknown values", () => {
    expect(() => parseLoggerArgs({...defaultArgs, logLevel: "loud"})).toThrow("Unknown log level 'loud'");
    expect(() => parseLoggerArgs({...defaultArgs, logFormat: "xml"})).toThrow("Unknown log format 'xml'");
    expect(() => parseLoggerArgs({...defaultArgs, logLevelModule: ["replay"]})).toThrow(
      "Invalid logLevelModule 'replay', expected 'module=level'"
    );
  });
});
