/**
 * Directory resources
 *
 * Converges the home directory and its .ssh subdirectory. Ownership and
 * mode are reapplied on every run so drift is corrected.
 */

import type { DirectoryDescriptor } from "@accountsmith/shared";
import { type CommandScripts, script, shellQuote } from "../lib/command";

function removeDirectoryScript(path: string): string {
    if (path === "/") {
        return script([`echo ${shellQuote("Refusing to remove / as a home directory, skipping")}`]);
    }
    const quoted = shellQuote(path);
    return script([
        `if [ -d ${quoted} ]; then`,
        `    rm -rf ${quoted}`,
        `    echo ${shellQuote(`Directory ${path} removed`)}`,
        "else",
        `    echo ${shellQuote(`Directory ${path} already absent`)}`,
        "fi",
    ]);
}

/**
 * Builds the scripts for a directory descriptor
 */
export function directoryScripts(descriptor: DirectoryDescriptor): CommandScripts {
    const { path, owner, group, mode, ensure } = descriptor;

    if (ensure === "absent") {
        return { create: removeDirectoryScript(path) };
    }

    const quoted = shellQuote(path);
    const ownership = owner === undefined ? undefined : group === undefined ? owner : `${owner}:${group}`;

    return {
        create: script([
            `mkdir -p ${quoted}`,
            ownership !== undefined && `chown ${shellQuote(ownership)} ${quoted}`,
            mode !== undefined && `chmod ${mode} ${quoted}`,
            `echo ${shellQuote(`Directory ${path} ready`)}`,
        ]),
        delete: removeDirectoryScript(path),
    };
}
