import type {ChainConfig} from "@randao-election/params";
import type {Slot, Validator} from "@randao-election/types";
import {RandaoMixes} from "./randaoMixes.js";
import {StateError, StateErrorCode} from "./errors.js";

/**
 * The part of a beacon state committee election reads. Treated as read-only for the lifetime of an election,
 * advancing to another epoch means building a new state.
 */
export type LightState = {
  readonly slot: Slot;
  /** Registry ordered, the array position is the validator index */
  readonly validators: readonly Validator[];
  readonly randaoMixes: RandaoMixes;
};

export function createLightState(
  config: ChainConfig,
  {slot, validators, randaoMixes}: {slot: Slot; validators: readonly Validator[]; randaoMixes?: RandaoMixes}
): LightState {
  const mixes = randaoMixes ?? RandaoMixes.empty(config);
  if (mixes.length !== config.EPOCHS_PER_HISTORICAL_VECTOR) {
    throw new StateError({
      code: StateErrorCode.INVALID_RANDAO_MIX_LENGTH,
      expected: config.EPOCHS_PER_HISTORICAL_VECTOR,
      actual: mixes.length,
    });
  }

  validators.forEach((validator, index) => {
    if (validator.activationEpoch > validator.exitEpoch) {
      throw new StateError({
        code: StateErrorCode.INVALID_VALIDATOR_EPOCHS,
        index,
        activationEpoch: validator.activationEpoch,
        exitEpoch: validator.exitEpoch,
      });
    }
  });

  return Object.freeze({slot, validators: Object.freeze([...validators]), randaoMixes: mixes});
}
