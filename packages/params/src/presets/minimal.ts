import {BeaconPreset} from "../interface.js";

// Minimal preset
// https://github.com/ethereum/consensus-specs/tree/dev/presets/minimal

export const minimalPreset: BeaconPreset = {
  // Misc
  TARGET_COMMITTEE_SIZE: 4,
  MAX_COMMITTEES_PER_SLOT: 4,
  SHUFFLE_ROUND_COUNT: 10,

  // Time parameters
  SLOTS_PER_EPOCH: 8,
  MIN_SEED_LOOKAHEAD: 1,

  // State list lengths
  EPOCHS_PER_HISTORICAL_VECTOR: 64,
};
