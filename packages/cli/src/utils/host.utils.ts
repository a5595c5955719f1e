/**
 * Locating and driving the Pulumi host program
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { execa } from "execa";

/**
 * Resolve the host package directory from this script's location.
 *
 * This file lives at <root>/packages/cli/src/utils/host.utils.ts,
 * so the host package is <root>/packages/host.
 */
export function getHostPackageDir(): string {
    const __dirname = path.dirname(fileURLToPath(import.meta.url));
    return path.resolve(__dirname, "..", "..", "..", "host");
}

function stackArgs(stack?: string): string[] {
    return stack ? ["--stack", stack] : [];
}

export interface SetPulumiConfigOptions {
    stack?: string;
    /** Store the value encrypted in the stack file */
    secret?: boolean;
}

export async function setPulumiConfig(
    key: string,
    value: string,
    options: SetPulumiConfigOptions = {}
): Promise<void> {
    const args = [
        "config",
        "set",
        `accountsmith:${key}`,
        value,
        ...(options.secret ? ["--secret"] : []),
        ...stackArgs(options.stack),
    ];
    await execa("pulumi", args, { cwd: getHostPackageDir(), stdio: "inherit" });
}

export async function removePulumiConfig(key: string, stack?: string): Promise<void> {
    await execa("pulumi", ["config", "rm", `accountsmith:${key}`, ...stackArgs(stack)], {
        cwd: getHostPackageDir(),
        stdio: "inherit",
    });
}

export async function runPulumiUp(options: { yes: boolean; stack?: string }): Promise<void> {
    const args = ["up", ...(options.yes ? ["--yes"] : []), ...stackArgs(options.stack)];
    await execa("pulumi", args, { cwd: getHostPackageDir(), stdio: "inherit" });
}
