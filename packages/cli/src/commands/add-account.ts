/**
 * add-account command - Interactively declare an account in the accounts file
 */

import type { CommandModule } from "yargs";
import { input, confirm } from "@inquirer/prompts";
import { buildAccountPlan, detectOsFamily, isValidationError } from "@accountsmith/shared";
import {
    DEFAULT_ACCOUNTS_FILE,
    readAccountsFileOrEmpty,
    writeAccountsFile,
} from "../utils/accounts-file.utils.js";
import { formatPlan } from "../utils/format.utils.js";

export interface AddAccountArgs {
    file: string;
}

export interface CollectedAccount {
    requestId: string;
    params: Record<string, unknown>;
}

/**
 * Prompts for the parameters of one account
 */
export async function promptAccount(): Promise<CollectedAccount> {
    const requestId = (
        await input({
            message: "Username:",
            validate: (v) => v.trim().length > 0 || "Username is required",
        })
    ).trim();

    const shell = await input({ message: "Login shell:", default: "/bin/bash" });
    const groups = (await input({ message: "Supplementary groups (comma separated):", default: "" }))
        .split(",")
        .map((group) => group.trim())
        .filter((group) => group.length > 0);
    const createGroup = await confirm({
        message: `Create a dedicated '${requestId}' group?`,
        default: true,
    });

    const params: Record<string, unknown> = { shell, create_group: createGroup };
    if (groups.length > 0) {
        params.groups = groups;
    }

    if (await confirm({ message: "Add an SSH key?", default: true })) {
        const label = await input({ message: "Key label:", default: "default" });
        const type = await input({ message: "Key type:", default: "ssh-ed25519" });
        const key = await input({
            message: "Key material (base64, without type or comment):",
            validate: (v) => v.trim().length > 0 || "Key material is required",
        });
        params.ssh_keys = { [label.trim()]: { type: type.trim(), key: key.trim() } };
    }

    return { requestId, params };
}

/**
 * Validates the account and writes it into the accounts file.
 * Returns the process exit code.
 */
export async function addAccount(file: string, account: CollectedAccount): Promise<number> {
    const { requestId, params } = account;

    let lines: string[];
    try {
        lines = formatPlan(requestId, buildAccountPlan(params, { osFamily: detectOsFamily(), requestId }));
    } catch (err) {
        if (isValidationError(err)) {
            console.error(`\nInvalid account: ${err.message}`);
            return 1;
        }
        throw err;
    }

    const accounts = readAccountsFileOrEmpty(file);
    if (requestId in accounts) {
        const overwrite = await confirm({
            message: `${requestId} is already declared in ${file}. Replace it?`,
            default: false,
        });
        if (!overwrite) {
            console.log("Aborted. The accounts file was not changed.");
            return 1;
        }
    }

    writeAccountsFile(file, { ...accounts, [requestId]: params });

    console.log(`\nSaved ${requestId} to ${file}. Planned resources:\n`);
    for (const line of lines) {
        console.log(line);
    }
    console.log("\nRun `accountsmith apply` to converge the host.\n");
    return 0;
}

export const addAccountCommand: CommandModule<object, AddAccountArgs> = {
    command: "add-account",
    describe: "Interactively add an account to the accounts file",
    builder: {
        file: {
            alias: "f",
            type: "string",
            description: "Accounts JSON file",
            default: DEFAULT_ACCOUNTS_FILE,
        },
    },
    handler: async (argv) => {
        console.log("\nAccountsmith - Add Account\n");
        process.exitCode = await addAccount(argv.file, await promptAccount());
    },
};
