/**
 * apply command - Push the accounts to Pulumi config and run `pulumi up`
 */

import type { CommandModule } from "yargs";
import { confirm } from "@inquirer/prompts";
import { buildAccountPlans, detectOsFamily } from "@accountsmith/shared";
import { DEFAULT_ACCOUNTS_FILE, readAccountsFile } from "../utils/accounts-file.utils.js";
import { removePulumiConfig, runPulumiUp, setPulumiConfig } from "../utils/host.utils.js";

export interface ApplyArgs {
    file: string;
    yes: boolean;
    stack?: string;
    "os-family"?: string;
}

export interface ApplyOptions {
    file: string;
    yes: boolean;
    stack?: string;
    osFamily?: string;
}

/**
 * Validates every account, confirms removals, then deploys.
 * Returns the process exit code.
 */
export async function runApply(options: ApplyOptions): Promise<number> {
    const accounts = readAccountsFile(options.file);
    const osFamily = options.osFamily ?? detectOsFamily();
    const results = buildAccountPlans(accounts, { osFamily });

    const invalid = results.filter((result) => !result.ok);
    if (invalid.length > 0) {
        for (const result of invalid) {
            if (!result.ok) {
                console.error(`${result.requestId}: ${result.error.message}`);
            }
        }
        console.error("\nFix the accounts above before applying. Nothing was changed.");
        return 1;
    }

    const removals = results.flatMap((result) =>
        result.ok && result.plan.spec.ensure === "absent" ? [result.plan.spec.username] : []
    );
    if (removals.length > 0 && !options.yes) {
        const proceed = await confirm({
            message: `Remove ${removals.join(", ")} including home directories?`,
            default: false,
        });
        if (!proceed) {
            console.log("Aborted. Nothing was changed.");
            return 1;
        }
    }

    try {
        // Accounts may carry password hashes
        await setPulumiConfig("accounts", JSON.stringify(accounts), {
            stack: options.stack,
            secret: true,
        });
        if (options.osFamily !== undefined) {
            await setPulumiConfig("os-family", options.osFamily, { stack: options.stack });
        } else {
            // Drop an override left by an earlier apply so the host detects its family again
            await removePulumiConfig("os-family", options.stack);
        }
        await runPulumiUp({ yes: options.yes, stack: options.stack });
    } catch (err) {
        console.error(`\npulumi failed: ${err instanceof Error ? err.message : String(err)}`);
        console.error("Make sure a Pulumi stack is selected in packages/host.");
        return 1;
    }

    console.log(`\nApplied ${results.length} account(s).\n`);
    return 0;
}

export const applyCommand: CommandModule<object, ApplyArgs> = {
    command: "apply",
    describe: "Apply the accounts file with pulumi up",
    builder: {
        file: {
            alias: "f",
            type: "string",
            description: "Accounts JSON file",
            default: DEFAULT_ACCOUNTS_FILE,
        },
        yes: {
            alias: "y",
            type: "boolean",
            description: "Skip confirmations (removals and pulumi preview)",
            default: false,
        },
        stack: {
            type: "string",
            description: "Pulumi stack to deploy (default: selected stack)",
        },
        "os-family": {
            type: "string",
            description: "Override OS family detection on the host",
        },
    },
    handler: async (argv) => {
        process.exitCode = await runApply({
            file: argv.file,
            yes: argv.yes,
            stack: argv.stack,
            osFamily: argv.osFamily,
        });
    },
};
