import type {CliCommandOptions} from "@randao-election/utils";

export type ReplayArgs = {
  validators: string;
  committees: string[];
  blocks: string[];
  startEpoch: number;
  endEpoch?: number;
};

export const replayOptions: CliCommandOptions<ReplayArgs> = {
  validators: {
    description: "Path to a validators response (JSON) of a state at or after the replayed epochs",
    type: "string",
    demandOption: true,
  },

  committees: {
    description: "Paths to committees responses (JSON) holding the ground truth of the replayed epochs",
    type: "array",
    string: true,
    demandOption: true,
  },

  blocks: {
    description: "Paths to block responses (JSON) whose prev_randao seed the replayed epochs",
    type: "array",
    string: true,
    demandOption: true,
  },

  startEpoch: {
    description: "First epoch to replay",
    type: "number",
    demandOption: true,
  },

  endEpoch: {
    description: "Last epoch to replay, inclusive. Defaults to startEpoch",
    type: "number",
  },
};
