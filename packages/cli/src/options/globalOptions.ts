import {PresetName} from "@randao-election/params";
import type {CliCommandOptions} from "@randao-election/utils";
import {logOptions} from "./logOptions.js";
import type {LogArgs} from "./logOptions.js";

type GlobalSingleArgs = {
  preset: string;
  paramsFile?: string;
};

export const defaultPreset = PresetName.mainnet;

const globalSingleOptions: CliCommandOptions<GlobalSingleArgs> = {
  preset: {
    description: "Name of the preset the chain runs with",
    type: "string",
    choices: Object.values(PresetName),
    default: defaultPreset,
  },

  paramsFile: {
    description: "Preset values overriding the selected preset, accepted formats: .yml, .yaml, .json",
    type: "string",
  },
};

export type GlobalArgs = GlobalSingleArgs & LogArgs;

export const globalOptions = {
  ...globalSingleOptions,
  ...logOptions,
};
