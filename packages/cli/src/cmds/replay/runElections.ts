import type {ChainConfig} from "@randao-election/params";
import {
  RandaoMixes,
  computeEpochAtSlot,
  computeEpochShuffling,
  computeStartSlotAtEpoch,
  createLightState,
  getActiveValidatorIndices,
  verifyShufflingCommittees,
} from "@randao-election/state-transition";
import type {EpochVerification} from "@randao-election/state-transition";
import type {BeaconCommittee, Epoch, LightBlock, Validator} from "@randao-election/types";
import {assert} from "@randao-election/utils";
import type {Logger} from "@randao-election/utils";

export type ElectionInputs = {
  /** Registry ordered validators of the snapshot */
  validators: readonly Validator[];
  /** Blocks whose `prev_randao` seed the mix ring, in any order */
  blocks: readonly Pick<LightBlock, "slot" | "prevRandao">[];
  /** Ground truth committees of every replayed epoch, in any order */
  committees: readonly BeaconCommittee[];
  startEpoch: Epoch;
  /** Inclusive */
  endEpoch: Epoch;
};

/**
 * Recompute the committees of epochs `startEpoch..endEpoch` and compare each epoch with the ground truth.
 * Returns one verification per epoch, in epoch order.
 */
export function runElections(config: ChainConfig, logger: Logger, inputs: ElectionInputs): EpochVerification[] {
  const {startEpoch, endEpoch} = inputs;
  assert.lte(startEpoch, endEpoch, "startEpoch must not be after endEpoch");

  const randaoMixes = RandaoMixes.fromBlocks(config, inputs.blocks);
  const state = createLightState(config, {
    slot: computeStartSlotAtEpoch(config, endEpoch),
    validators: inputs.validators,
    randaoMixes,
  });
  logger.verbose("Loaded election state", {validators: state.validators.length, randaoMixes: randaoMixes.size});

  const committeesByEpoch = groupCommitteesByEpoch(config, inputs.committees);
  const results: EpochVerification[] = [];

  for (let epoch = startEpoch; epoch <= endEpoch; epoch++) {
    const startTime = Date.now();
    const expected = committeesByEpoch.get(epoch) ?? [];
    if (expected.length === 0) {
      logger.warn("No ground truth committees for epoch", {epoch});
    }

    const seedMixEpoch = RandaoMixes.seedMixEpoch(config, epoch);
    if (!randaoMixes.has(seedMixEpoch)) {
      logger.warn("Missing RANDAO mix seeding epoch, reading zeros", {epoch, seedMixEpoch});
    }
    const loadedTime = Date.now();

    const activeIndices = getActiveValidatorIndices(state, epoch);
    const activeTime = Date.now();

    const shuffling = computeEpochShuffling(config, state, activeIndices, epoch);
    const result = verifyShufflingCommittees(config, shuffling, expected);
    const doneTime = Date.now();

    logger.verbose("Computed epoch committees", {
      epoch,
      activeValidators: activeIndices.length,
      committeesPerSlot: shuffling.committeesPerSlot,
      loadMs: loadedTime - startTime,
      activeSetMs: activeTime - loadedTime,
      committeesMs: doneTime - activeTime,
    });

    for (const mismatch of result.mismatches) {
      logger.warn("Committee mismatch", {
        epoch,
        slot: mismatch.slot,
        index: mismatch.index,
        expected: mismatch.expected.length,
        computed: mismatch.computed.length,
      });
    }

    if (result.passed) {
      logger.info("Epoch committees match", {epoch, committees: result.committeeCount});
    } else {
      logger.warn("Epoch committees do not match", {
        epoch,
        committees: result.committeeCount,
        mismatches: result.mismatches.length,
      });
    }

    results.push(result);
  }

  return results;
}

function groupCommitteesByEpoch(
  config: ChainConfig,
  committees: readonly BeaconCommittee[]
): Map<Epoch, BeaconCommittee[]> {
  const byEpoch = new Map<Epoch, BeaconCommittee[]>();
  for (const committee of committees) {
    const epoch = computeEpochAtSlot(config, committee.slot);
    let epochCommittees = byEpoch.get(epoch);
    if (epochCommittees === undefined) {
      epochCommittees = [];
      byEpoch.set(epoch, epochCommittees);
    }
    epochCommittees.push(committee);
  }
  return byEpoch;
}
