import {createChainConfig, isPresetName, presetFromJson} from "@randao-election/params";
import type {BeaconPreset, ChainConfig} from "@randao-election/params";
import type {GlobalArgs} from "./options/index.js";
import {FileFormat, YargsError, readFile} from "./util/index.js";

/**
 * Build the ChainConfig from `--preset`, with the values of `--paramsFile` applied on top
 */
export function getChainConfig(args: Pick<GlobalArgs, "preset" | "paramsFile">): ChainConfig {
  if (!isPresetName(args.preset)) {
    throw new YargsError(`Unknown preset '${args.preset}'`);
  }

  let overrides: Partial<BeaconPreset> = {};
  if (args.paramsFile !== undefined) {
    const json = readFile(args.paramsFile, [FileFormat.json, FileFormat.yaml, FileFormat.yml]);
    if (!isRecord(json)) {
      throw new YargsError(`paramsFile ${args.paramsFile} must contain a key-value mapping`);
    }
    overrides = presetFromJson(json);
  }

  return createChainConfig(args.preset, overrides);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
