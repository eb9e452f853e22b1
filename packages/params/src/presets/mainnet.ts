import {BeaconPreset} from "../interface.js";

// Mainnet preset
// https://github.com/ethereum/consensus-specs/tree/dev/presets/mainnet

export const mainnetPreset: BeaconPreset = {
  // Misc
  TARGET_COMMITTEE_SIZE: 128,
  MAX_COMMITTEES_PER_SLOT: 64,
  SHUFFLE_ROUND_COUNT: 90,

  // Time parameters
  SLOTS_PER_EPOCH: 32,
  MIN_SEED_LOOKAHEAD: 1,

  // State list lengths
  EPOCHS_PER_HISTORICAL_VECTOR: 65536,
};
