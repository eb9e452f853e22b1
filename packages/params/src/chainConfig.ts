import {BeaconPreset, beaconPresetKeys} from "./interface.js";
import {PresetName} from "./presetName.js";
import {mainnetPreset} from "./presets/mainnet.js";
import {minimalPreset} from "./presets/minimal.js";
import {gnosisPreset} from "./presets/gnosis.js";
import {ConfigError, ConfigErrorCode} from "./errors.js";

/**
 * Immutable chain configuration handed to every election function. Several configurations may
 * coexist in one process, nothing reads a global preset.
 */
export type ChainConfig = Readonly<BeaconPreset> & {
  readonly PRESET_BASE: PresetName | "custom";
};

export const presets: Record<PresetName, BeaconPreset> = {
  [PresetName.mainnet]: mainnetPreset,
  [PresetName.minimal]: minimalPreset,
  [PresetName.gnosis]: gnosisPreset,
};

export function isPresetName(name: string): name is PresetName {
  return Object.values<string>(PresetName).includes(name);
}

export function getPreset(name: string): BeaconPreset {
  if (!isPresetName(name)) {
    throw new ConfigError({code: ConfigErrorCode.UNKNOWN_PRESET, presetName: name});
  }
  return presets[name];
}

/**
 * Create a frozen ChainConfig from a named preset or an explicit preset, applying `overrides` on top.
 */
export function createChainConfig(
  preset: PresetName | BeaconPreset,
  overrides: Partial<BeaconPreset> = {}
): ChainConfig {
  const base = typeof preset === "string" ? getPreset(preset) : preset;
  const config: ChainConfig = {
    ...base,
    ...overrides,
    PRESET_BASE: typeof preset === "string" && Object.keys(overrides).length === 0 ? preset : "custom",
  };
  validateChainConfig(config);
  return Object.freeze(config);
}

function validateChainConfig(config: ChainConfig): void {
  for (const key of beaconPresetKeys) {
    const value = config[key];
    // MIN_SEED_LOOKAHEAD is the only value allowed to be zero
    const min = key === "MIN_SEED_LOOKAHEAD" ? 0 : 1;
    if (!Number.isSafeInteger(value) || value < min) {
      throw invalidValue(key, value, `expected integer >= ${min}`);
    }
  }

  // The round number is serialized in a single byte
  if (config.SHUFFLE_ROUND_COUNT > 256) {
    throw invalidValue("SHUFFLE_ROUND_COUNT", config.SHUFFLE_ROUND_COUNT, "must fit in one byte");
  }

  if (config.MIN_SEED_LOOKAHEAD >= config.EPOCHS_PER_HISTORICAL_VECTOR) {
    throw invalidValue(
      "MIN_SEED_LOOKAHEAD",
      config.MIN_SEED_LOOKAHEAD,
      "must be lower than EPOCHS_PER_HISTORICAL_VECTOR"
    );
  }
}

function invalidValue(key: string, value: number, reason: string): ConfigError {
  return new ConfigError({code: ConfigErrorCode.INVALID_PRESET_VALUE, key, value: String(value), reason});
}
