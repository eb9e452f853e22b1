import {digest} from "@chainsafe/as-sha256";
import type {ChainConfig} from "@randao-election/params";
import {VALIDATOR_REGISTRY_LIMIT} from "@randao-election/params";
import type {Bytes32, DomainType, Epoch} from "@randao-election/types";
import {assert, bytesToBigInt, intToBytes} from "@randao-election/utils";
import type {LightState} from "../lightState.js";
import {ShufflingError, ShufflingErrorCode} from "../errors.js";

/**
 * Return the shuffled validator index corresponding to ``seed`` (and ``index_count``).
 *
 * Swap or not
 * https://link.springer.com/content/pdf/10.1007%2F978-3-642-32009-5_1.pdf
 *
 * See the 'generalized domain' algorithm on page 3.
 */
export function computeShuffledIndex(config: ChainConfig, index: number, indexCount: number, seed: Bytes32): number {
  assertShuffleBounds(index, indexCount);
  let permuted = index;
  for (let round = 0; round < config.SHUFFLE_ROUND_COUNT; round++) {
    const pivot = computePivot(seed, round, indexCount);
    const flip = (pivot + indexCount - permuted) % indexCount;
    const position = Math.max(permuted, flip);
    const source = computeSource(seed, round, Math.floor(position / 256));
    const byte = source[Math.floor((position % 256) / 8)];
    const bit = (byte >> (position % 8)) % 2;
    permuted = bit ? flip : permuted;
  }
  return permuted;
}

/**
 * Same as `computeShuffledIndex` for a fixed `indexCount` and `seed`, with the per round pivots and source
 * hashes shared across calls. For callers resolving many single indices of one shuffling.
 */
export function getComputeShuffledIndexFn(
  config: ChainConfig,
  indexCount: number,
  seed: Bytes32
): (index: number) => number {
  assert.lte(indexCount, VALIDATOR_REGISTRY_LIMIT, "indexCount too big");
  const rounds = config.SHUFFLE_ROUND_COUNT;
  const pivots: number[] = [];
  const sourcesByRound: Map<number, Uint8Array>[] = [];

  return (index: number): number => {
    assertShuffleBounds(index, indexCount);
    let permuted = index;
    for (let round = 0; round < rounds; round++) {
      if (pivots.length === round) {
        pivots.push(computePivot(seed, round, indexCount));
        sourcesByRound.push(new Map());
      }
      const pivot = pivots[round];
      const flip = (pivot + indexCount - permuted) % indexCount;
      const position = Math.max(permuted, flip);

      const sources = sourcesByRound[round];
      const sourceKey = Math.floor(position / 256);
      let source = sources.get(sourceKey);
      if (source === undefined) {
        source = computeSource(seed, round, sourceKey);
        sources.set(sourceKey, source);
      }

      const bit = (source[Math.floor((position % 256) / 8)] >> (position % 8)) % 2;
      permuted = bit ? flip : permuted;
    }
    return permuted;
  };
}

/**
 * Return the randao mix at a recent [[epoch]].
 */
export function getRandaoMix(state: Pick<LightState, "randaoMixes">, epoch: Epoch): Bytes32 {
  return state.randaoMixes.get(epoch);
}

/**
 * Return the seed at [[epoch]].
 */
export function getSeed(
  config: ChainConfig,
  state: Pick<LightState, "randaoMixes">,
  epoch: Epoch,
  domainType: DomainType
): Uint8Array {
  const mix = getRandaoMix(state, epoch + config.EPOCHS_PER_HISTORICAL_VECTOR - config.MIN_SEED_LOOKAHEAD - 1);

  return digest(Buffer.concat([domainType, intToBytes(epoch, 8), mix]));
}

function assertShuffleBounds(index: number, indexCount: number): void {
  if (!(index < indexCount)) {
    throw new ShufflingError({code: ShufflingErrorCode.INDEX_OUT_OF_RANGE, index, indexCount});
  }
  assert.lte(indexCount, VALIDATOR_REGISTRY_LIMIT, "indexCount too big");
}

/**
 * pivot = bytes_to_int(hash(seed + int_to_bytes1(round))[0:8]) % index_count
 */
function computePivot(seed: Bytes32, round: number, indexCount: number): number {
  const h = digest(Buffer.concat([seed, intToBytes(round, 1)]));
  return Number(bytesToBigInt(h.subarray(0, 8)) % BigInt(indexCount));
}

/**
 * source = hash(seed + int_to_bytes1(round) + int_to_bytes4(position // 256))
 */
function computeSource(seed: Bytes32, round: number, positionWindow: number): Uint8Array {
  return digest(Buffer.concat([seed, intToBytes(round, 1), intToBytes(positionWindow, 4)]));
}
