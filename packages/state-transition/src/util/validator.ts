import type {Epoch, Validator, ValidatorIndex} from "@randao-election/types";
import type {LightState} from "../lightState.js";

/**
 * Check if [[validator]] is active
 */
export function isActiveValidator(validator: Pick<Validator, "activationEpoch" | "exitEpoch">, epoch: Epoch): boolean {
  return validator.activationEpoch <= epoch && epoch < validator.exitEpoch;
}

/**
 * Return the sequence of active validator indices at [[epoch]], ascending.
 */
export function getActiveValidatorIndices(state: Pick<LightState, "validators">, epoch: Epoch): Uint32Array {
  const indices: ValidatorIndex[] = [];
  state.validators.forEach((validator, index) => {
    if (isActiveValidator(validator, epoch)) {
      indices.push(index);
    }
  });
  return new Uint32Array(indices);
}
