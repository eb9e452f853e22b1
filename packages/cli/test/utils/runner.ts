import {getElectionCli} from "../../src/cli.js";

/**
 * Run the CLI in the test process, rejecting with the error a command throws instead of exiting
 */
export function getCliInMemoryRunner() {
  return async (args: string[]): Promise<void> => {
    return new Promise((resolve, reject) => {
      getElectionCli(args)
        // Method to execute when a failure occurs, rather than printing the failure message.
        .fail((msg, err) => {
          if (err !== undefined) reject(err);
          else if (msg) reject(Error(msg));
          else reject(Error("Unknown error"));
        })
        .help(false)
        .exitProcess(false)
        .parseAsync()
        .then(() => resolve())
        .catch((e: unknown) => reject(e));
    });
  };
}
