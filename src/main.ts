/**
 * Entry point for the command-line cleaning simulation.
 *
 *   npm start -- --n 5 --width 10 --height 10 --dirty-percent 100 --render
 */

import { runCli } from "./cli";

process.exitCode = runCli(process.argv.slice(2));
