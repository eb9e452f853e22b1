import {describe, it, expect} from "vitest";
import {digest} from "@chainsafe/as-sha256";
import {
  DOMAIN_BEACON_ATTESTER,
  DOMAIN_BEACON_PROPOSER,
  DOMAIN_RANDAO,
  PresetName,
  createChainConfig,
} from "@randao-election/params";
import {AssertionError} from "@randao-election/utils";
import {ShufflingError, ShufflingErrorCode} from "../../../src/index.js";
import {computeShuffledIndex, getComputeShuffledIndexFn, getRandaoMix, getSeed} from "../../../src/util/index.js";
import {filledBytes32, generateState} from "../../utils/state.js";

describe("getSeed", () => {
  const config = createChainConfig(PresetName.minimal);
  const mix = filledBytes32(0xab);
  // minimal: EPOCHS_PER_HISTORICAL_VECTOR 64, MIN_SEED_LOOKAHEAD 1, epoch 5 reads ring slot 3
  const state = generateState(config, {validators: [], mixes: [{epoch: 3, mix}]});

  it("should hash domain, little endian epoch and the lookahead mix", () => {
    const epochBytes = new Uint8Array([5, 0, 0, 0, 0, 0, 0, 0]);
    const expected = digest(Buffer.concat([DOMAIN_BEACON_ATTESTER, epochBytes, mix]));
    expect(getSeed(config, state, 5, DOMAIN_BEACON_ATTESTER)).toEqual(expected);
  });

  it("should be deterministic", () => {
    const other = generateState(config, {validators: [], mixes: [{epoch: 3, mix: filledBytes32(0xab)}]});
    expect(getSeed(config, state, 5, DOMAIN_RANDAO)).toEqual(getSeed(config, other, 5, DOMAIN_RANDAO));
  });

  it("should separate domains", () => {
    const attester = getSeed(config, state, 5, DOMAIN_BEACON_ATTESTER);
    const proposer = getSeed(config, state, 5, DOMAIN_BEACON_PROPOSER);
    expect(attester).not.toEqual(proposer);
  });

  it("should separate epochs reading the same mix", () => {
    // Epochs 5 and 69 both read ring slot 3
    expect(getRandaoMix(state, 69 + 64 - 2)).toEqual(mix);
    expect(getSeed(config, state, 5, DOMAIN_BEACON_ATTESTER)).not.toEqual(
      getSeed(config, state, 69, DOMAIN_BEACON_ATTESTER)
    );
  });

  it("should read zeros from an unpopulated ring slot", () => {
    const expected = digest(Buffer.concat([DOMAIN_BEACON_ATTESTER, new Uint8Array(8), new Uint8Array(32)]));
    expect(getSeed(config, state, 0, DOMAIN_BEACON_ATTESTER)).toEqual(expected);
  });
});

describe("computeShuffledIndex", () => {
  const config = createChainConfig(PresetName.mainnet);
  const seed = filledBytes32(0x42);

  it("should be a bijection", () => {
    for (const indexCount of [1, 2, 3, 17, 100]) {
      const permuted = Array.from({length: indexCount}, (_, i) => computeShuffledIndex(config, i, indexCount, seed));
      expect(new Set(permuted).size).toBe(indexCount);
      expect(Math.min(...permuted)).toBe(0);
      expect(Math.max(...permuted)).toBe(indexCount - 1);
    }
  });

  it("should return the only index of a single element list", () => {
    expect(computeShuffledIndex(config, 0, 1, seed)).toBe(0);
  });

  it("should reject an index out of range", () => {
    expect(() => computeShuffledIndex(config, 5, 5, seed)).toThrow(ShufflingError);

    let error: unknown = null;
    try {
      computeShuffledIndex(config, 0, 0, seed);
    } catch (e) {
      error = e;
    }
    expect(error instanceof ShufflingError ? error.type : error).toEqual({
      code: ShufflingErrorCode.INDEX_OUT_OF_RANGE,
      index: 0,
      indexCount: 0,
    });
  });

  it("should reject an index count past the registry limit", () => {
    expect(() => computeShuffledIndex(config, 0, 2 ** 40 + 1, seed)).toThrow(AssertionError);
  });

  it("should depend on the seed", () => {
    const indexCount = 1000;
    const a = Array.from({length: indexCount}, (_, i) => computeShuffledIndex(config, i, indexCount, seed));
    const b = Array.from({length: indexCount}, (_, i) =>
      computeShuffledIndex(config, i, indexCount, filledBytes32(0x43))
    );
    expect(a).not.toEqual(b);
  });
});

describe("getComputeShuffledIndexFn", () => {
  const config = createChainConfig(PresetName.mainnet);

  for (const indexCount of [1, 2, 3, 300, 1000]) {
    it(`should match computeShuffledIndex for indexCount ${indexCount}`, () => {
      const seed = filledBytes32(indexCount % 256);
      const shuffledIndexFn = getComputeShuffledIndexFn(config, indexCount, seed);
      for (let i = 0; i < indexCount; i++) {
        expect(shuffledIndexFn(i)).toBe(computeShuffledIndex(config, i, indexCount, seed));
      }
    });
  }

  it("should reject an index out of range", () => {
    const shuffledIndexFn = getComputeShuffledIndexFn(config, 10, filledBytes32(1));
    expect(() => shuffledIndexFn(10)).toThrow(ShufflingError);
  });
});
