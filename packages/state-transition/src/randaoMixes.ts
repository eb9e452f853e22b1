import type {ChainConfig} from "@randao-election/params";
import type {Bytes32, Epoch, LightBlock} from "@randao-election/types";
import {computeEpochAtSlot} from "./util/epoch.js";
import {StateError, StateErrorCode} from "./errors.js";

const MIX_LENGTH = 32;

/**
 * Ring of RANDAO mixes, one slot per epoch, read at `epoch % length`.
 *
 * A ring is never mutated once built: `withMix` returns a new ring, so an election that already holds
 * a ring keeps reading the same mixes while the caller advances to the next epoch.
 * Slots nobody populated read as 32 zero bytes.
 */
export class RandaoMixes {
  private constructor(
    readonly length: number,
    private readonly mixes: ReadonlyMap<number, Bytes32>
  ) {}

  static empty(config: ChainConfig): RandaoMixes {
    return new RandaoMixes(config.EPOCHS_PER_HISTORICAL_VECTOR, new Map());
  }

  static fromMixes(config: ChainConfig, entries: Iterable<{epoch: Epoch; mix: Bytes32}>): RandaoMixes {
    const length = config.EPOCHS_PER_HISTORICAL_VECTOR;
    const mixes = new Map<number, Bytes32>();
    for (const {epoch, mix} of entries) {
      mixes.set(epoch % length, copyMix(mix));
    }
    return new RandaoMixes(length, mixes);
  }

  /**
   * Ring seeded by `prev_randao` of the earliest given block of each epoch. Later blocks of an epoch carry
   * intermediate mixes and are ignored, `blocks` may come in any order.
   */
  static fromBlocks(config: ChainConfig, blocks: Iterable<Pick<LightBlock, "slot" | "prevRandao">>): RandaoMixes {
    const firstBlockByEpoch = new Map<Epoch, Pick<LightBlock, "slot" | "prevRandao">>();
    for (const block of blocks) {
      const epoch = computeEpochAtSlot(config, block.slot);
      const current = firstBlockByEpoch.get(epoch);
      if (current === undefined || block.slot < current.slot) {
        firstBlockByEpoch.set(epoch, block);
      }
    }

    let randaoMixes = RandaoMixes.empty(config);
    for (const block of firstBlockByEpoch.values()) {
      randaoMixes = randaoMixes.withMixFromBlock(config, block);
    }
    return randaoMixes;
  }

  /**
   * Ring epoch whose mix seeds the shuffling of `epoch`, i.e. `epoch - MIN_SEED_LOOKAHEAD - 1` modulo the ring length
   */
  static seedMixEpoch(config: ChainConfig, epoch: Epoch): Epoch {
    return (
      (epoch + config.EPOCHS_PER_HISTORICAL_VECTOR - config.MIN_SEED_LOOKAHEAD - 1) %
      config.EPOCHS_PER_HISTORICAL_VECTOR
    );
  }

  /** Number of populated slots */
  get size(): number {
    return this.mixes.size;
  }

  get(epoch: Epoch): Bytes32 {
    const mix = this.mixes.get(epoch % this.length);
    return mix !== undefined ? Uint8Array.from(mix) : new Uint8Array(MIX_LENGTH);
  }

  has(epoch: Epoch): boolean {
    return this.mixes.has(epoch % this.length);
  }

  withMix(epoch: Epoch, mix: Bytes32): RandaoMixes {
    const mixes = new Map(this.mixes);
    mixes.set(epoch % this.length, copyMix(mix));
    return new RandaoMixes(this.length, mixes);
  }

  /**
   * Store the `prev_randao` of a block. The first block of epoch `E` carries the final mix of epoch `E - 1`,
   * which seeds the shuffling of epoch `E + MIN_SEED_LOOKAHEAD`.
   */
  withMixFromBlock(config: ChainConfig, block: Pick<LightBlock, "slot" | "prevRandao">): RandaoMixes {
    const blockEpoch = computeEpochAtSlot(config, block.slot);
    return this.withMix(blockEpoch + this.length - 1, block.prevRandao);
  }
}

function copyMix(mix: Bytes32): Bytes32 {
  if (mix.length !== MIX_LENGTH) {
    throw new StateError({code: StateErrorCode.INVALID_RANDAO_MIX_LENGTH, expected: MIX_LENGTH, actual: mix.length});
  }
  return Uint8Array.from(mix);
}
