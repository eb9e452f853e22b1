import {digest} from "@chainsafe/as-sha256";
import type {ChainConfig} from "@randao-election/params";
import {VALIDATOR_REGISTRY_LIMIT} from "@randao-election/params";
import type {Bytes32} from "@randao-election/types";
import {assert, bytesToBigInt} from "@randao-election/utils";
import {ShufflingError, ShufflingErrorCode} from "../errors.js";

/**
 * Caller owned list of indices, permuted in place
 */
export type ShuffleInput = {length: number; [index: number]: number};

/**
 * Shuffle a list of indices so that `output[i] = input[computeShuffledIndex(i)]`. Mutates the input list.
 *
 * The list is owned by this function until it returns: nothing else may read or write it meanwhile.
 */
export function shuffleList(config: ChainConfig, input: ShuffleInput, seed: Bytes32): void {
  innerShuffleList(config, input, seed, false);
}

/**
 * Undo `shuffleList` for the same seed. Mutates the input list.
 */
export function inverseShuffleList(config: ChainConfig, input: ShuffleInput, seed: Bytes32): void {
  innerShuffleList(config, input, seed, true);
}

const _SHUFFLE_H_SEED_SIZE = 32;
const _SHUFFLE_H_ROUND_SIZE = 1;
const _SHUFFLE_H_POSITION_WINDOW_SIZE = 4;
const _SHUFFLE_H_PIVOT_VIEW_SIZE = _SHUFFLE_H_SEED_SIZE + _SHUFFLE_H_ROUND_SIZE;
const _SHUFFLE_H_TOTAL_SIZE = _SHUFFLE_H_SEED_SIZE + _SHUFFLE_H_ROUND_SIZE + _SHUFFLE_H_POSITION_WINDOW_SIZE;

/*
Whole list variant of the swap-or-not shuffle.

Each round pairs position `i` with `flip = (pivot - i) mod n`. The pairs mirror around `pivot / 2` in
[0, pivot] and around `(pivot + n) / 2` in (pivot, n), so sweeping `i` from `mirror1 = (pivot + 2) / 2`
to `mirror2 = (pivot + n) / 2` visits every pair exactly once, with `i` as the higher position of the
lower half and `flip` as the higher position of the upper half.

The swap bit of position `p` lives in hash(seed + round + uint32(p / 256)), so one hash serves 256
consecutive positions. Positions ascend in the lower half and descend in the upper half, the hash is
refreshed when the sweep crosses into another window.
*/

// Runs rounds descending when shuffling, ascending when undoing
function innerShuffleList(config: ChainConfig, input: ShuffleInput, seed: Bytes32, inverse: boolean): void {
  if (input.length === 0) {
    throw new ShufflingError({code: ShufflingErrorCode.EMPTY_INPUT});
  }
  assert.lte(input.length, VALIDATOR_REGISTRY_LIMIT, "listSize too big");
  assert.equal(seed.length, _SHUFFLE_H_SEED_SIZE, "Invalid seed length");

  const listSize = input.length;
  const rounds = config.SHUFFLE_ROUND_COUNT;

  // Seed is always the first 32 bytes of the hash input, we never have to change this part of the buffer.
  const buf = Buffer.alloc(_SHUFFLE_H_TOTAL_SIZE);
  buf.set(seed, 0);

  function setPositionUint32(value: number): void {
    // Little endian
    buf[_SHUFFLE_H_PIVOT_VIEW_SIZE] = value & 0xff;
    buf[_SHUFFLE_H_PIVOT_VIEW_SIZE + 1] = (value >>> 8) & 0xff;
    buf[_SHUFFLE_H_PIVOT_VIEW_SIZE + 2] = (value >>> 16) & 0xff;
    buf[_SHUFFLE_H_PIVOT_VIEW_SIZE + 3] = (value >>> 24) & 0xff;
  }

  for (let step = 0; step < rounds; step++) {
    const round = inverse ? step : rounds - 1 - step;
    buf[_SHUFFLE_H_SEED_SIZE] = round;

    // pivot = bytes_to_int(hash(seed + int_to_bytes1(round))[0:8]) % list_size
    const h = digest(buf.subarray(0, _SHUFFLE_H_PIVOT_VIEW_SIZE));
    const pivot = Number(bytesToBigInt(h.subarray(0, 8)) % BigInt(listSize));

    const mirror1 = Math.floor((pivot + 2) / 2);
    const mirror2 = Math.floor((pivot + listSize) / 2);

    // Always overwritten on the first iteration, which is either `mirror1` or `pivot + 1`
    let source: Uint8Array = h;

    for (let i = mirror1; i <= mirror2; i++) {
      let flip: number;
      let bitIndex: number;

      if (i <= pivot) {
        flip = pivot - i;
        bitIndex = i % 256;
        if (bitIndex === 0 || i === mirror1) {
          setPositionUint32(Math.floor(i / 256));
          source = digest(buf);
        }
      } else {
        flip = pivot + listSize - i;
        bitIndex = flip % 256;
        if (bitIndex === 255 || i === pivot + 1) {
          setPositionUint32(Math.floor(flip / 256));
          source = digest(buf);
        }
      }

      const bit = (source[bitIndex >> 3] >> (bitIndex & 0x7)) & 0x1;
      if (bit === 1) {
        // swap the pair items
        const tmp = input[i];
        input[i] = input[flip];
        input[flip] = tmp;
      }
    }
  }
}
