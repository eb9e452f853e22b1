import {BeaconPreset, beaconPresetKeys} from "./interface.js";
import {ConfigError, ConfigErrorCode} from "./errors.js";

/**
 * Render BeaconPreset to JSON strings
 * - Numbers: Render as a quoted decimal string
 */
export function presetToJson(preset: BeaconPreset): Record<string, string> {
  const json: Record<string, string> = {};

  for (const key of beaconPresetKeys) {
    json[key] = preset[key].toString(10);
  }

  return json;
}

/**
 * Parse JSON strings of BeaconPreset
 * - Numbers: Convert quoted decimal string to number
 * - Unknown keys are ignored, preset files carry values for other components too
 */
export function presetFromJson(json: Record<string, unknown>): Partial<BeaconPreset> {
  const beaconPreset: Partial<BeaconPreset> = {};

  for (const key of beaconPresetKeys) {
    const value = json[key];
    if (value !== undefined) {
      beaconPreset[key] = deserializePresetValue(value, key);
    }
  }

  return beaconPreset;
}

/**
 * Ensure that all values of parsed BeaconPreset are integers. Quoted decimal strings are the preset
 * file format, plain numbers are accepted for hand-written JSON.
 */
function deserializePresetValue(valueStr: unknown, keyName: string): number {
  if (typeof valueStr === "number" && Number.isSafeInteger(valueStr)) {
    return valueStr;
  }

  if (typeof valueStr !== "string" || !/^[0-9]+$/.test(valueStr)) {
    throw new ConfigError({
      code: ConfigErrorCode.INVALID_PRESET_VALUE,
      key: keyName,
      value: String(valueStr),
      reason: "expected decimal string",
    });
  }

  return parseInt(valueStr, 10);
}
