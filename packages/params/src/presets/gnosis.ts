import {BeaconPreset} from "../interface.js";
import {mainnetPreset} from "./mainnet.js";

// Gnosis preset
// https://github.com/gnosischain/specs/tree/master/consensus/preset/gnosis

export const gnosisPreset: BeaconPreset = {
  ...mainnetPreset,

  /// NOTE: Only add diff values

  SLOTS_PER_EPOCH: 16,
};
