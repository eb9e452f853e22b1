import {parseBlockResponse, parseCommitteesResponse, parseValidatorsResponse} from "@randao-election/types";
import type {EpochVerification} from "@randao-election/state-transition";
import type {GlobalArgs} from "../../options/index.js";
import {getChainConfig} from "../../config.js";
import {YargsError, getCliLogger, readJsonFile} from "../../util/index.js";
import type {ReplayArgs} from "./options.js";
import {runElections} from "./runElections.js";

export async function replayHandler(args: ReplayArgs & GlobalArgs): Promise<EpochVerification[]> {
  const config = getChainConfig(args);
  const logger = getCliLogger(args).child({module: "replay"});

  const startEpoch = args.startEpoch;
  const endEpoch = args.endEpoch ?? startEpoch;
  if (!isEpoch(startEpoch) || !isEpoch(endEpoch) || startEpoch > endEpoch) {
    throw new YargsError(`Invalid epoch range ${startEpoch}..${endEpoch}`);
  }

  const {validators, executionOptimistic} = parseValidatorsResponse(readJsonFile(args.validators));
  if (executionOptimistic) {
    logger.warn("Validators response is execution optimistic", {file: args.validators});
  }

  const committees = args.committees.flatMap((file) => parseCommitteesResponse(readJsonFile(file)).committees);
  const blocks = args.blocks.map((file) => parseBlockResponse(readJsonFile(file)));
  logger.info("Replaying committee elections", {
    preset: config.PRESET_BASE,
    startEpoch,
    endEpoch,
    validators: validators.length,
    committees: committees.length,
    blocks: blocks.length,
  });

  const results = runElections(config, logger, {validators, committees, blocks, startEpoch, endEpoch});

  const failed = results.filter((result) => !result.passed).map((result) => result.epoch);
  if (failed.length > 0) {
    logger.error("Committee verification failed", {epochs: failed.join(",")});
    process.exitCode = 1;
  } else {
    logger.info("Committee verification passed", {epochs: results.length});
  }

  return results;
}

function isEpoch(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}
