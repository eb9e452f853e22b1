import {describe, it, expect} from "vitest";
import {PresetName, createChainConfig} from "@randao-election/params";
import {
  RandaoMixes,
  computeEpochShuffling,
  createLightState,
  getActiveValidatorIndices,
  getBeaconCommittee,
  getEpochCommittees,
  verifyEpochCommittees,
} from "../../src/index.js";
import type {LightState} from "../../src/index.js";
import {filledBytes32, generateValidators} from "../utils/state.js";

describe("committee election for a small registry", () => {
  const config = createChainConfig(PresetName.minimal, {SLOTS_PER_EPOCH: 4, MAX_COMMITTEES_PER_SLOT: 1});
  const mix = Uint8Array.from({length: 32}, (_, i) => 255 - i);

  function buildState(): LightState {
    // Epoch 0 reads ring slot 62
    const randaoMixes = RandaoMixes.empty(config).withMix(RandaoMixes.seedMixEpoch(config, 0), mix);
    return createLightState(config, {slot: 0, validators: generateValidators(10), randaoMixes});
  }

  it("should split epoch 0 into 4 disjoint committees covering every validator", () => {
    const state = buildState();
    const shuffling = computeEpochShuffling(config, state, getActiveValidatorIndices(state, 0), 0);

    expect(shuffling.committeesPerSlot).toBe(1);
    const committees = [0, 1, 2, 3].map((slot) => Array.from(getBeaconCommittee(config, state, slot, 0)));
    // floor(10 * k / 4) offsets
    expect(committees.map((committee) => committee.length)).toEqual([2, 3, 2, 3]);

    const concatenation = committees.flat();
    expect(concatenation).toEqual(Array.from(shuffling.shuffling));
    expect([...concatenation].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("should reproduce identical committees from identical inputs", () => {
    const first = getEpochCommittees(config, computeEpochShuffling(config, buildState(), new Uint32Array(range(10)), 0));
    const second = getEpochCommittees(config, computeEpochShuffling(config, buildState(), new Uint32Array(range(10)), 0));
    expect(second).toEqual(first);
    expect(verifyEpochCommittees(config, buildState(), 0, first).passed).toBe(true);
  });

  it("should change committees with the mix", () => {
    const state = buildState();
    const other = createLightState(config, {
      slot: 0,
      validators: state.validators,
      randaoMixes: state.randaoMixes.withMix(62, filledBytes32(0)),
    });
    const a = computeEpochShuffling(config, state, getActiveValidatorIndices(state, 0), 0);
    const b = computeEpochShuffling(config, other, getActiveValidatorIndices(other, 0), 0);
    expect(Array.from(b.shuffling)).not.toEqual(Array.from(a.shuffling));
  });
});

function range(n: number): number[] {
  return Array.from({length: n}, (_, i) => i);
}
