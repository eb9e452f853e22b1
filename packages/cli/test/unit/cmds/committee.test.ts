import fs from "node:fs";
import path from "node:path";
import {describe, it, expect, beforeAll, afterAll, afterEach, vi} from "vitest";
import {PresetName, createChainConfig} from "@randao-election/params";
import {RandaoMixes, createLightState, getBeaconCommittee} from "@randao-election/state-transition";
import {getCliInMemoryRunner} from "../../utils/runner.js";
import {generateValidators, getTmpDir, toBlockResponse, toValidatorsResponse, writePayload} from "../../utils/payloads.js";

describe("cmds / committee", () => {
  const runCli = getCliInMemoryRunner();
  const config = createChainConfig(PresetName.minimal);
  const validators = generateValidators(16);
  const mix = new Uint8Array(32).fill(0x11);

  let dir: string;
  let baseArgs: string[];

  beforeAll(() => {
    dir = getTmpDir();
    baseArgs = [
      "committee",
      "--preset",
      "minimal",
      "--logLevel",
      "error",
      "--validators",
      writePayload(dir, "validators", toValidatorsResponse(validators)),
      "--blocks",
      writePayload(dir, "block_0", toBlockResponse(0, mix)),
    ];
  });

  afterAll(() => {
    fs.rmSync(dir, {recursive: true, force: true});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the committee of a slot", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await runCli([...baseArgs, "--slot", "10", "--index", "0"]);

    const state = createLightState(config, {slot: 10, validators, randaoMixes: RandaoMixes.empty(config).withMix(63, mix)});
    const expected = Array.from(getBeaconCommittee(config, state, 10, 0));
    expect(expected).toHaveLength(2);
    expect(log).toHaveBeenCalledWith(JSON.stringify(expected));
  });

  it("seeds the epoch from its first block whatever the file order", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const firstMix = new Uint8Array(32).fill(0x11);
    const blockFiles = [
      writePayload(dir, "block_8", toBlockResponse(8, firstMix)),
      writePayload(dir, "block_9", toBlockResponse(9, new Uint8Array(32).fill(0x22))),
    ];

    await runCli([...baseArgs.slice(0, -2), "--blocks", ...blockFiles, "--slot", "16", "--index", "0"]);

    const state = createLightState(config, {
      slot: 16,
      validators,
      randaoMixes: RandaoMixes.empty(config).withMix(0, firstMix),
    });
    expect(log).toHaveBeenCalledWith(JSON.stringify(Array.from(getBeaconCommittee(config, state, 16, 0))));
  });

  it("rejects a committee index past the committees of the slot", async () => {
    await expect(runCli([...baseArgs, "--slot", "10", "--index", "1"])).rejects.toThrow(
      "Committee index 1 out of range, epoch 1 has 1 per slot"
    );
  });

  it("rejects a missing payload file", async () => {
    const missing = path.join(dir, "missing.json");
    await expect(runCli(["committee", "--validators", missing, "--blocks", missing, "--slot", "0"])).rejects.toThrow(
      `File not found: ${missing}`
    );
  });
});
