import {
  RandaoMixes,
  computeEpochAtSlot,
  computeEpochShuffling,
  createLightState,
  getActiveValidatorIndices,
  getBeaconCommitteeFromShuffling,
} from "@randao-election/state-transition";
import {parseBlockResponse, parseValidatorsResponse} from "@randao-election/types";
import type {ValidatorIndex} from "@randao-election/types";
import type {GlobalArgs} from "../../options/index.js";
import {getChainConfig} from "../../config.js";
import {YargsError, getCliLogger, readJsonFile} from "../../util/index.js";
import type {CommitteeArgs} from "./options.js";

export async function committeeHandler(args: CommitteeArgs & GlobalArgs): Promise<ValidatorIndex[]> {
  const config = getChainConfig(args);
  const logger = getCliLogger(args).child({module: "committee"});

  if (!Number.isSafeInteger(args.slot) || args.slot < 0) {
    throw new YargsError(`Invalid slot ${args.slot}`);
  }
  if (!Number.isSafeInteger(args.index) || args.index < 0) {
    throw new YargsError(`Invalid committee index ${args.index}`);
  }

  const {validators} = parseValidatorsResponse(readJsonFile(args.validators));
  const randaoMixes = RandaoMixes.fromBlocks(
    config,
    args.blocks.map((file) => parseBlockResponse(readJsonFile(file)))
  );

  const epoch = computeEpochAtSlot(config, args.slot);
  const state = createLightState(config, {slot: args.slot, validators, randaoMixes});

  const shuffling = computeEpochShuffling(config, state, getActiveValidatorIndices(state, epoch), epoch);
  if (args.index >= shuffling.committeesPerSlot) {
    throw new YargsError(
      `Committee index ${args.index} out of range, epoch ${epoch} has ${shuffling.committeesPerSlot} per slot`
    );
  }

  const committee = Array.from(getBeaconCommitteeFromShuffling(config, shuffling, args.slot, args.index));
  logger.verbose("Computed committee", {epoch, slot: args.slot, index: args.index, size: committee.length});

  console.log(JSON.stringify(committee));
  return committee;
}
