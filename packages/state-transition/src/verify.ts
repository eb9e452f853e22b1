import type {ChainConfig} from "@randao-election/params";
import type {BeaconCommittee, CommitteeIndex, Epoch, Slot, ValidatorIndex} from "@randao-election/types";
import type {LightState} from "./lightState.js";
import {getEpochCommittees} from "./util/committee.js";
import type {EpochShuffling} from "./util/epochShuffling.js";
import {computeEpochShuffling} from "./util/epochShuffling.js";
import {getActiveValidatorIndices} from "./util/validator.js";

export type CommitteeMismatch = {
  slot: Slot;
  index: CommitteeIndex;
  /** Empty if the ground truth has no such committee */
  expected: ValidatorIndex[];
  /** Empty if the epoch has no such committee */
  computed: ValidatorIndex[];
};

export type EpochVerification = {
  epoch: Epoch;
  passed: boolean;
  /** Committees computed for the epoch */
  committeeCount: number;
  mismatches: CommitteeMismatch[];
};

/**
 * Compute every committee of `epoch` and compare it with the ground truth `expected`.
 *
 * Mismatches are returned, not thrown. Neither `state` nor `expected` is modified.
 */
export function verifyEpochCommittees(
  config: ChainConfig,
  state: LightState,
  epoch: Epoch,
  expected: readonly BeaconCommittee[]
): EpochVerification {
  const activeIndices = getActiveValidatorIndices(state, epoch);
  const shuffling = computeEpochShuffling(config, state, activeIndices, epoch);
  return verifyShufflingCommittees(config, shuffling, expected);
}

/**
 * Compare the committees of a precomputed shuffling with the ground truth `expected`
 */
export function verifyShufflingCommittees(
  config: ChainConfig,
  shuffling: EpochShuffling,
  expected: readonly BeaconCommittee[]
): EpochVerification {
  const computed = getEpochCommittees(config, shuffling);

  const expectedByKey = new Map<string, BeaconCommittee>();
  for (const committee of expected) {
    expectedByKey.set(committeeKey(committee), committee);
  }

  const mismatches: CommitteeMismatch[] = [];
  for (const committee of computed) {
    const key = committeeKey(committee);
    const expectedCommittee = expectedByKey.get(key);
    expectedByKey.delete(key);
    const expectedValidators = expectedCommittee?.validators ?? [];
    if (!arrayEquals(expectedValidators, committee.validators)) {
      mismatches.push({
        slot: committee.slot,
        index: committee.index,
        expected: expectedValidators,
        computed: committee.validators,
      });
    }
  }

  // Ground truth committees the epoch does not have
  for (const committee of expectedByKey.values()) {
    mismatches.push({slot: committee.slot, index: committee.index, expected: committee.validators, computed: []});
  }

  // The canonical concatenation also catches duplicated ground truth entries
  const expectedConcatenation = [...expected]
    .sort((a, b) => a.slot - b.slot || a.index - b.index)
    .flatMap((committee) => committee.validators);
  const passed = mismatches.length === 0 && arrayEquals(expectedConcatenation, Array.from(shuffling.shuffling));

  return {epoch: shuffling.epoch, passed, committeeCount: computed.length, mismatches};
}

function committeeKey(committee: Pick<BeaconCommittee, "slot" | "index">): string {
  return `${committee.slot}/${committee.index}`;
}

function arrayEquals(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}
