import {describe, it, expect} from "vitest";
import {
  BeaconPreset,
  ConfigError,
  ConfigErrorCode,
  PresetName,
  createChainConfig,
  getPreset,
  gnosisPreset,
  mainnetPreset,
  minimalPreset,
} from "../../src/index.js";

describe("createChainConfig", () => {
  it("should load named presets", () => {
    const params: [PresetName, BeaconPreset][] = [
      [PresetName.mainnet, mainnetPreset],
      [PresetName.minimal, minimalPreset],
      [PresetName.gnosis, gnosisPreset],
    ];

    for (const [name, preset] of params) {
      const config = createChainConfig(name);
      expect(config.PRESET_BASE).toBe(name);
      expect(config.SLOTS_PER_EPOCH).toBe(preset.SLOTS_PER_EPOCH);
      expect(config.SHUFFLE_ROUND_COUNT).toBe(preset.SHUFFLE_ROUND_COUNT);
    }
  });

  it("should apply overrides and mark the config as custom", () => {
    const config = createChainConfig(PresetName.mainnet, {SLOTS_PER_EPOCH: 4, MAX_COMMITTEES_PER_SLOT: 1});
    expect(config.PRESET_BASE).toBe("custom");
    expect(config.SLOTS_PER_EPOCH).toBe(4);
    expect(config.MAX_COMMITTEES_PER_SLOT).toBe(1);
    expect(config.TARGET_COMMITTEE_SIZE).toBe(128);
  });

  it("should not share state between configs", () => {
    const a = createChainConfig(PresetName.mainnet, {SLOTS_PER_EPOCH: 4});
    const b = createChainConfig(PresetName.mainnet);
    expect(a.SLOTS_PER_EPOCH).toBe(4);
    expect(b.SLOTS_PER_EPOCH).toBe(32);
    expect(mainnetPreset.SLOTS_PER_EPOCH).toBe(32);
  });

  it("should return a frozen object", () => {
    const config = createChainConfig(PresetName.minimal);
    expect(Object.isFrozen(config)).toBe(true);
  });

  const invalidCases: {id: string; overrides: Partial<BeaconPreset>; key: string}[] = [
    {id: "zero slots per epoch", overrides: {SLOTS_PER_EPOCH: 0}, key: "SLOTS_PER_EPOCH"},
    {id: "fractional committee size", overrides: {TARGET_COMMITTEE_SIZE: 1.5}, key: "TARGET_COMMITTEE_SIZE"},
    {id: "negative lookahead", overrides: {MIN_SEED_LOOKAHEAD: -1}, key: "MIN_SEED_LOOKAHEAD"},
    {id: "round count over one byte", overrides: {SHUFFLE_ROUND_COUNT: 257}, key: "SHUFFLE_ROUND_COUNT"},
    {
      id: "lookahead past the historical vector",
      overrides: {MIN_SEED_LOOKAHEAD: 64, EPOCHS_PER_HISTORICAL_VECTOR: 64},
      key: "MIN_SEED_LOOKAHEAD",
    },
  ];

  for (const {id, overrides, key} of invalidCases) {
    it(`should reject ${id}`, () => {
      let error: ConfigError | null = null;
      try {
        createChainConfig(PresetName.mainnet, overrides);
      } catch (e) {
        if (e instanceof ConfigError) error = e;
      }
      expect(error).toBeInstanceOf(ConfigError);
      expect(error?.type).toMatchObject({code: ConfigErrorCode.INVALID_PRESET_VALUE, key});
    });
  }

  it("should accept a zero seed lookahead", () => {
    expect(createChainConfig(PresetName.minimal, {MIN_SEED_LOOKAHEAD: 0}).MIN_SEED_LOOKAHEAD).toBe(0);
  });

  it("should reject an unknown preset name", () => {
    expect(() => getPreset("holesky")).toThrow(ConfigErrorCode.UNKNOWN_PRESET);
  });
});
