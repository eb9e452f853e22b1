import type {CliCommand} from "@randao-election/utils";
import type {EpochVerification} from "@randao-election/state-transition";
import type {GlobalArgs} from "../../options/index.js";
import {replayOptions} from "./options.js";
import type {ReplayArgs} from "./options.js";
import {replayHandler} from "./handler.js";

export const replay: CliCommand<ReplayArgs, GlobalArgs, EpochVerification[]> = {
  command: "replay",
  describe: "Recompute the committees of a range of epochs and compare them with the committees a beacon node reported",
  examples: [
    {
      command:
        "replay --validators validators.json --committees committees.json --blocks block_320.json --startEpoch 11",
      description: "Verify the committees of epoch 11, seeded by the first block of epoch 10",
    },
  ],
  options: replayOptions,
  handler: replayHandler,
};
