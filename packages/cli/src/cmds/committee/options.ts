import type {CliCommandOptions} from "@randao-election/utils";

export type CommitteeArgs = {
  validators: string;
  blocks: string[];
  slot: number;
  index: number;
};

export const committeeOptions: CliCommandOptions<CommitteeArgs> = {
  validators: {
    description: "Path to a validators response (JSON)",
    type: "string",
    demandOption: true,
  },

  blocks: {
    description: "Paths to block responses (JSON) whose prev_randao seed the epoch of the slot",
    type: "array",
    string: true,
    demandOption: true,
  },

  slot: {
    description: "Slot of the committee",
    type: "number",
    demandOption: true,
  },

  index: {
    description: "Committee index within the slot",
    type: "number",
    default: 0,
  },
};
