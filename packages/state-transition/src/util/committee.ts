import type {ChainConfig} from "@randao-election/params";
import type {BeaconCommittee, Bytes32, CommitteeIndex, Slot, ValidatorIndex} from "@randao-election/types";
import {assert, safeMultiply} from "@randao-election/utils";
import type {LightState} from "../lightState.js";
import {CommitteeError, CommitteeErrorCode, ShufflingError, ShufflingErrorCode} from "../errors.js";
import {computeEpochAtSlot, computeStartSlotAtEpoch} from "./epoch.js";
import type {EpochShuffling} from "./epochShuffling.js";
import {computeEpochShuffling} from "./epochShuffling.js";
import {getComputeShuffledIndexFn} from "./seed.js";
import {getActiveValidatorIndices} from "./validator.js";

/**
 * Return committee `index` of `count` committees, resolving each member with the single index shuffle.
 *
 * Matches the slice `computeEpochShuffling` produces for the same seed, without shuffling the whole list.
 */
export function computeCommittee(
  config: ChainConfig,
  indices: ArrayLike<ValidatorIndex>,
  seed: Bytes32,
  index: number,
  count: number
): ValidatorIndex[] {
  if (indices.length === 0) {
    throw new ShufflingError({code: ShufflingErrorCode.EMPTY_INPUT});
  }
  assert.lt(index, count, "Committee index out of range");

  const start = Math.floor(safeMultiply(indices.length, index) / count);
  const end = Math.floor(safeMultiply(indices.length, index + 1) / count);
  const shuffledIndexFn = getComputeShuffledIndexFn(config, indices.length, seed);

  const committee: ValidatorIndex[] = [];
  for (let i = start; i < end; i++) {
    committee.push(indices[shuffledIndexFn(i)]);
  }
  return committee;
}

/**
 * Return the beacon committee at `slot` for `index`, shuffling the epoch of `slot` from scratch
 */
export function getBeaconCommittee(
  config: ChainConfig,
  state: Pick<LightState, "validators" | "randaoMixes">,
  slot: Slot,
  index: CommitteeIndex
): Uint32Array {
  const epoch = computeEpochAtSlot(config, slot);
  const activeIndices = getActiveValidatorIndices(state, epoch);
  const shuffling = computeEpochShuffling(config, state, activeIndices, epoch);
  return getBeaconCommitteeFromShuffling(config, shuffling, slot, index);
}

/**
 * Return the beacon committee at `slot` for `index` from a precomputed shuffling, as a copy the caller owns
 */
export function getBeaconCommitteeFromShuffling(
  config: ChainConfig,
  shuffling: EpochShuffling,
  slot: Slot,
  index: CommitteeIndex
): Uint32Array {
  const slotOffset = slot - computeStartSlotAtEpoch(config, shuffling.epoch);
  if (slotOffset < 0 || slotOffset >= config.SLOTS_PER_EPOCH) {
    throw new CommitteeError({code: CommitteeErrorCode.SLOT_NOT_IN_EPOCH, slot, epoch: shuffling.epoch});
  }
  if (index >= shuffling.committeesPerSlot) {
    throw new CommitteeError({
      code: CommitteeErrorCode.COMMITTEE_INDEX_OUT_OF_RANGE,
      index,
      committeesPerSlot: shuffling.committeesPerSlot,
    });
  }
  return shuffling.committees[slotOffset][index].slice();
}

/**
 * List every committee of the shuffling epoch, ordered by slot then committee index
 */
export function getEpochCommittees(config: ChainConfig, shuffling: EpochShuffling): BeaconCommittee[] {
  const startSlot = computeStartSlotAtEpoch(config, shuffling.epoch);
  const committees: BeaconCommittee[] = [];
  shuffling.committees.forEach((slotCommittees, slotOffset) => {
    slotCommittees.forEach((validators, index) => {
      committees.push({index, slot: startSlot + slotOffset, validators: Array.from(validators)});
    });
  });
  return committees;
}
