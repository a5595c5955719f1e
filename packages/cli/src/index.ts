#!/usr/bin/env -S node --import tsx

/**
 * Accountsmith CLI
 *
 * Command-line interface for planning and applying declarative accounts.
 * Run `accountsmith --help` for usage information.
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { planCommand } from "./commands/plan.js";
import { applyCommand } from "./commands/apply.js";
import { addAccountCommand } from "./commands/add-account.js";

await yargs(hideBin(process.argv))
    .scriptName("accountsmith")
    .usage("$0 <command> [options]")
    .command(planCommand)
    .command(applyCommand)
    .command(addAccountCommand)
    .demandCommand(1, "Please specify a command. Run accountsmith --help for available commands.")
    .strict()
    .help()
    .alias("h", "help")
    .version("1.0.0")
    .alias("v", "version")
    .parse();
