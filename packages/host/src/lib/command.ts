/**
 * Command execution utilities for Pulumi
 * Wraps @pulumi/command for consistent usage across resource appliers
 */

import * as command from "@pulumi/command";
import type * as pulumi from "@pulumi/pulumi";

export interface RunCommandOptions {
    /** Unique resource name */
    name: string;
    /** Command to execute on create */
    create: string;
    /** Command to execute on delete (optional) */
    delete?: string;
    /** Command to execute on update (optional, defaults to create) */
    update?: string;
    /** Resources this command depends on */
    dependsOn?: pulumi.Resource[];
    /** Environment variables */
    environment?: Record<string, pulumi.Input<string>>;
}

/**
 * Runs a local command
 * Uses @pulumi/command local.Command
 */
export function runCommand(options: RunCommandOptions): command.local.Command {
    const { name, create, delete: deleteCmd, update, dependsOn, environment } = options;

    return new command.local.Command(
        name,
        {
            create,
            delete: deleteCmd,
            update: update ?? create,
            environment,
        },
        { dependsOn }
    );
}

/**
 * Quotes a value for POSIX sh as a single-quoted word
 */
export function shellQuote(value: string): string {
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Create/delete script pair for one resource
 */
export interface CommandScripts {
    create: string;
    /** Run by `pulumi destroy`; omitted for removal resources */
    delete?: string;
}

/**
 * Joins script lines, dropping the empty ones left by optional steps.
 * Scripts run under `set -e` so a failing step fails the resource.
 */
export function script(lines: Array<string | false | undefined>): string {
    return ["set -e", ...lines]
        .filter((line): line is string => typeof line === "string" && line !== "")
        .join("\n");
}

/**
 * Indents script lines for use inside an if/else block
 */
export function indent(lines: string[]): string[] {
    return lines.map((line) => `    ${line}`);
}
