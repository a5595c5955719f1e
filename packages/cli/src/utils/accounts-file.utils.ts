/**
 * Reading and writing the accounts JSON file
 *
 * Shape: { "accounts": { "<request id>": { ...account parameters } } }
 */

import * as fs from "node:fs";
import { z } from "zod";
import type { AccountsInput } from "@accountsmith/shared";

export const DEFAULT_ACCOUNTS_FILE = "accounts.json";

const accountsFileSchema = z.object({
    accounts: z.record(z.unknown()),
});

export function readAccountsFile(file: string): AccountsInput {
    if (!fs.existsSync(file)) {
        throw new Error(`Accounts file not found: ${file}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(file, "utf-8"));
    } catch (err) {
        throw new Error(`Could not parse ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const result = accountsFileSchema.safeParse(parsed);
    if (!result.success) {
        throw new Error(`${file} must contain an "accounts" object mapping names to account parameters`);
    }
    return result.data.accounts;
}

/**
 * Reads the accounts file, or returns no accounts when it does not exist yet
 */
export function readAccountsFileOrEmpty(file: string): AccountsInput {
    return fs.existsSync(file) ? readAccountsFile(file) : {};
}

export function writeAccountsFile(file: string, accounts: AccountsInput): void {
    fs.writeFileSync(file, `${JSON.stringify({ accounts }, null, 4)}\n`);
}
