import {describe, it, expect} from "vitest";
import {FAR_FUTURE_EPOCH, PresetName, createChainConfig} from "@randao-election/params";
import {RandaoMixes, StateError, StateErrorCode, createLightState} from "../../src/index.js";
import {generateValidator, generateValidators} from "../utils/state.js";

describe("createLightState", () => {
  const config = createChainConfig(PresetName.minimal);

  it("should default to an empty ring", () => {
    const state = createLightState(config, {slot: 12, validators: generateValidators(3)});
    expect(state.slot).toBe(12);
    expect(state.validators).toHaveLength(3);
    expect(state.randaoMixes.size).toBe(0);
    expect(Object.isFrozen(state)).toBe(true);
  });

  it("should not share the caller's validator array", () => {
    const validators = generateValidators(2);
    const state = createLightState(config, {slot: 0, validators});
    validators.push(generateValidator());
    expect(state.validators).toHaveLength(2);
  });

  it("should accept a validator that never exits", () => {
    const validators = [generateValidator({activationEpoch: FAR_FUTURE_EPOCH, exitEpoch: FAR_FUTURE_EPOCH})];
    expect(createLightState(config, {slot: 0, validators}).validators).toHaveLength(1);
  });

  it("should reject a validator exiting before it activates", () => {
    const validators = [generateValidator(), generateValidator({activationEpoch: 5, exitEpoch: 4})];
    let error: unknown = null;
    try {
      createLightState(config, {slot: 0, validators});
    } catch (e) {
      error = e;
    }
    expect(error instanceof StateError ? error.type : error).toEqual({
      code: StateErrorCode.INVALID_VALIDATOR_EPOCHS,
      index: 1,
      activationEpoch: 5,
      exitEpoch: 4,
    });
  });

  it("should reject a ring built for another config", () => {
    const mainnet = createChainConfig(PresetName.mainnet);
    let error: unknown = null;
    try {
      createLightState(config, {slot: 0, validators: [], randaoMixes: RandaoMixes.empty(mainnet)});
    } catch (e) {
      error = e;
    }
    expect(error instanceof StateError ? error.type : error).toEqual({
      code: StateErrorCode.INVALID_RANDAO_MIX_LENGTH,
      expected: 64,
      actual: 65536,
    });
  });
});
