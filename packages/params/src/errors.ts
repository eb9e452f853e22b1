import {ElectionError} from "@randao-election/utils";

export enum ConfigErrorCode {
  /** A preset value is missing, not an integer or out of its range */
  INVALID_PRESET_VALUE = "CONFIG_ERROR_INVALID_PRESET_VALUE",
  UNKNOWN_PRESET = "CONFIG_ERROR_UNKNOWN_PRESET",
}

export type ConfigErrorType =
  | {code: ConfigErrorCode.INVALID_PRESET_VALUE; key: string; value: string; reason: string}
  | {code: ConfigErrorCode.UNKNOWN_PRESET; presetName: string};

export class ConfigError extends ElectionError<ConfigErrorType> {}
