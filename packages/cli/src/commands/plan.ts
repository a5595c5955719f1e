/**
 * plan command - Preview the resources for every declared account
 */

import type { CommandModule } from "yargs";
import { buildAccountPlans, detectOsFamily } from "@accountsmith/shared";
import { DEFAULT_ACCOUNTS_FILE, readAccountsFile } from "../utils/accounts-file.utils.js";
import { formatPlan, planResultsToJson } from "../utils/format.utils.js";

export interface PlanArgs {
    file: string;
    json: boolean;
    "os-family"?: string;
}

export interface PlanOptions {
    file: string;
    json: boolean;
    osFamily?: string;
}

/**
 * Prints the plan for every account in the file.
 * Returns the process exit code: 1 when any account failed validation.
 */
export function runPlan(options: PlanOptions): number {
    const accounts = readAccountsFile(options.file);
    const osFamily = options.osFamily ?? detectOsFamily();
    const results = buildAccountPlans(accounts, { osFamily });

    if (options.json) {
        console.log(JSON.stringify(planResultsToJson(results), null, 2));
    } else {
        console.log(`\nAccount plan (${osFamily} family)\n`);
        for (const result of results) {
            if (!result.ok) {
                console.error(`${result.requestId}: invalid - ${result.error.message}`);
                continue;
            }
            for (const line of formatPlan(result.requestId, result.plan)) {
                console.log(line);
            }
            for (const warning of result.plan.warnings) {
                console.warn(`  warning: ${warning.message}`);
            }
        }
        console.log("");
    }

    return results.some((result) => !result.ok) ? 1 : 0;
}

export const planCommand: CommandModule<object, PlanArgs> = {
    command: "plan",
    describe: "Show the ordered resources each account resolves to",
    builder: {
        file: {
            alias: "f",
            type: "string",
            description: "Accounts JSON file",
            default: DEFAULT_ACCOUNTS_FILE,
        },
        json: {
            type: "boolean",
            description: "Print descriptors as JSON",
            default: false,
        },
        "os-family": {
            type: "string",
            description: "OS family for home directory defaults (default: detected)",
        },
    },
    handler: (argv) => {
        process.exitCode = runPlan({
            file: argv.file,
            json: argv.json,
            osFamily: argv.osFamily,
        });
    },
};
