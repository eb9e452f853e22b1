// Must not use `* as yargs`, see https://github.com/yargs/yargs/issues/1131
import yargs from "yargs";
import type {Argv} from "yargs";
import {hideBin} from "yargs/helpers";
import {registerCommandToYargs} from "@randao-election/utils";
import {cmds} from "./cmds/index.js";
import {globalOptions} from "./options/index.js";

const topBanner = `randao-election: recompute beacon chain committees from a validator snapshot and RANDAO mixes,
and compare them with the committees a beacon node reports.`;
const bottomBanner = `Payload files are beacon API response bodies saved as JSON:
  * /eth/v1/beacon/states/{state_id}/validators
  * /eth/v1/beacon/states/{state_id}/committees
  * /eth/v2/beacon/blocks/{block_id}`;

export {runElections} from "./cmds/replay/runElections.js";
export type {ElectionInputs} from "./cmds/replay/runElections.js";

/**
 * Common factory for running the CLI and running integration tests
 * The CLI must actually be executed in a different script
 */
export function getElectionCli(args: string[] = hideBin(process.argv)): Argv {
  const cli = yargs(args)
    .env("RANDAO_ELECTION")
    .parserConfiguration({
      // As of yargs v16.1.0 dot-notation breaks strictOptions()
      // Manually processing options is typesafe tho more verbose
      "dot-notation": false,
    })
    .options(globalOptions)
    // blank scriptName so that help text doesn't display the cli name before each command
    .scriptName("")
    .demandCommand(1)
    // Control show help behaviour below on .fail()
    .showHelpOnFail(false)
    .usage(topBanner)
    .epilogue(bottomBanner)
    .alias("h", "help")
    .recommendCommands();

  // yargs.command and all ./cmds
  for (const cmd of cmds) {
    registerCommandToYargs(cli, cmd);
  }

  // throw an error if we see an unrecognized cmd
  cli.recommendCommands().strict();

  return cli;
}
