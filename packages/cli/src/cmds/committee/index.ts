import type {CliCommand} from "@randao-election/utils";
import type {ValidatorIndex} from "@randao-election/types";
import type {GlobalArgs} from "../../options/index.js";
import {committeeOptions} from "./options.js";
import type {CommitteeArgs} from "./options.js";
import {committeeHandler} from "./handler.js";

export const committee: CliCommand<CommitteeArgs, GlobalArgs, ValidatorIndex[]> = {
  command: "committee",
  describe: "Compute a single beacon committee and print its validator indices as JSON",
  examples: [
    {
      command: "committee --validators validators.json --blocks block_320.json --slot 352 --index 3",
      description: "Print committee 3 of slot 352 (epoch 11) on mainnet",
    },
  ],
  options: committeeOptions,
  handler: committeeHandler,
};
