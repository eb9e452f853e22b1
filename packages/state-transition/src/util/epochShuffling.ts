import type {ChainConfig} from "@randao-election/params";
import {DOMAIN_BEACON_ATTESTER} from "@randao-election/params";
import type {Epoch} from "@randao-election/types";
import {intDiv, safeMultiply} from "@randao-election/utils";
import type {LightState} from "../lightState.js";
import {ShufflingError, ShufflingErrorCode} from "../errors.js";
import {getSeed} from "./seed.js";
import {shuffleList} from "./shuffle.js";
import {getActiveValidatorIndices} from "./validator.js";

export type EpochShuffling = {
  /**
   * Epoch being shuffled
   */
  epoch: Epoch;

  /**
   * Non-shuffled active validator indices
   */
  activeIndices: Uint32Array;

  /**
   * The active validator indices, shuffled into their committee
   */
  shuffling: Uint32Array;

  /**
   * List of list of committees Committees
   *
   * Committees by index, by slot. Each committee is a view into `shuffling`, not to be written to
   */
  committees: Uint32Array[][];

  /**
   * Committees per slot
   */
  committeesPerSlot: number;
};

export function computeCommitteeCount(config: ChainConfig, activeValidatorCount: number): number {
  const validatorsPerSlot = intDiv(activeValidatorCount, config.SLOTS_PER_EPOCH);
  const committeesPerSlot = intDiv(validatorsPerSlot, config.TARGET_COMMITTEE_SIZE);
  return Math.max(1, Math.min(config.MAX_COMMITTEES_PER_SLOT, committeesPerSlot));
}

/**
 * Return the number of committees in each slot for the given `epoch`.
 */
export function getCommitteeCountPerSlot(config: ChainConfig, state: Pick<LightState, "validators">, epoch: Epoch): number {
  return computeCommitteeCount(config, getActiveValidatorIndices(state, epoch).length);
}

function buildCommitteesFromShuffling(config: ChainConfig, shuffling: Uint32Array): Uint32Array[][] {
  const activeValidatorCount = shuffling.length;
  const committeesPerSlot = computeCommitteeCount(config, activeValidatorCount);
  const committeeCount = safeMultiply(committeesPerSlot, config.SLOTS_PER_EPOCH);

  const committees = new Array<Uint32Array[]>(config.SLOTS_PER_EPOCH);
  for (let slot = 0; slot < config.SLOTS_PER_EPOCH; slot++) {
    const slotCommittees = new Array<Uint32Array>(committeesPerSlot);

    for (let committeeIndex = 0; committeeIndex < committeesPerSlot; committeeIndex++) {
      const index = slot * committeesPerSlot + committeeIndex;
      const startOffset = Math.floor(safeMultiply(activeValidatorCount, index) / committeeCount);
      const endOffset = Math.floor(safeMultiply(activeValidatorCount, index + 1) / committeeCount);
      if (!(startOffset <= endOffset)) {
        throw new Error(`Invalid offsets: start ${startOffset} must be less than or equal end ${endOffset}`);
      }
      slotCommittees[committeeIndex] = shuffling.subarray(startOffset, endOffset);
    }

    committees[slot] = slotCommittees;
  }

  return committees;
}

/**
 * Shuffle the active validators of `epoch` with the attester seed and slice them into the epoch committees.
 * `activeIndices` is not modified.
 */
export function computeEpochShuffling(
  config: ChainConfig,
  state: Pick<LightState, "randaoMixes">,
  activeIndices: Uint32Array,
  epoch: Epoch
): EpochShuffling {
  if (activeIndices.length === 0) {
    throw new ShufflingError({code: ShufflingErrorCode.NO_ACTIVE_VALIDATORS, epoch});
  }

  const seed = getSeed(config, state, epoch, DOMAIN_BEACON_ATTESTER);
  const shuffling = activeIndices.slice();
  shuffleList(config, shuffling, seed);
  const committees = buildCommitteesFromShuffling(config, shuffling);
  return {
    epoch,
    activeIndices,
    shuffling,
    committees,
    committeesPerSlot: committees[0].length,
  };
}
