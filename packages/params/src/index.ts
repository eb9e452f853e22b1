export * from "./constants.js";
export * from "./errors.js";
export type {BeaconPreset, BeaconPresetKey} from "./interface.js";
export {beaconPresetKeys} from "./interface.js";
export {PresetName} from "./presetName.js";
export {presetFromJson, presetToJson} from "./json.js";
export type {ChainConfig} from "./chainConfig.js";
export {createChainConfig, getPreset, isPresetName, presets} from "./chainConfig.js";
export {mainnetPreset} from "./presets/mainnet.js";
export {minimalPreset} from "./presets/minimal.js";
export {gnosisPreset} from "./presets/gnosis.js";
