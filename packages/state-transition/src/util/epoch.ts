import type {ChainConfig} from "@randao-election/params";
import type {Epoch, Slot} from "@randao-election/types";
import {safeMultiply} from "@randao-election/utils";

/**
 * Return the epoch number at the given slot.
 */
export function computeEpochAtSlot(config: ChainConfig, slot: Slot): Epoch {
  return Math.floor(slot / config.SLOTS_PER_EPOCH);
}

/**
 * Return the starting slot of the given epoch.
 */
export function computeStartSlotAtEpoch(config: ChainConfig, epoch: Epoch): Slot {
  return safeMultiply(epoch, config.SLOTS_PER_EPOCH);
}

/**
 * Return the end slot of the given epoch.
 */
export function computeEndSlotAtEpoch(config: ChainConfig, epoch: Epoch): Slot {
  return computeStartSlotAtEpoch(config, epoch + 1) - 1;
}

/**
 * Determine if the given slot is start slot of an epoch
 */
export function isStartSlotOfEpoch(config: ChainConfig, slot: Slot): boolean {
  return slot % config.SLOTS_PER_EPOCH === 0;
}
