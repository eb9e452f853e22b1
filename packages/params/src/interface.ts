/**
 * Preset values the committee election depends on. Every value is a non-negative integer.
 */
export type BeaconPreset = {
  SLOTS_PER_EPOCH: number;
  TARGET_COMMITTEE_SIZE: number;
  MAX_COMMITTEES_PER_SLOT: number;
  EPOCHS_PER_HISTORICAL_VECTOR: number;
  MIN_SEED_LOOKAHEAD: number;
  SHUFFLE_ROUND_COUNT: number;
};

export type BeaconPresetKey = keyof BeaconPreset;

/** Keys of {@link BeaconPreset}, in the order presets render them */
export const beaconPresetKeys: readonly BeaconPresetKey[] = [
  "SLOTS_PER_EPOCH",
  "TARGET_COMMITTEE_SIZE",
  "MAX_COMMITTEES_PER_SLOT",
  "EPOCHS_PER_HISTORICAL_VECTOR",
  "MIN_SEED_LOOKAHEAD",
  "SHUFFLE_ROUND_COUNT",
];
