/**
 * Group resource
 *
 * Converges the account's dedicated group with groupadd / groupdel.
 */

import type { GroupDescriptor } from "@accountsmith/shared";
import { type CommandScripts, script, shellQuote } from "../lib/command";

function removeGroupScript(name: string): string {
    const quoted = shellQuote(name);
    return script([
        `if getent group ${quoted} >/dev/null; then`,
        `    groupdel ${quoted}`,
        `    echo ${shellQuote(`Group ${name} removed`)}`,
        "else",
        `    echo ${shellQuote(`Group ${name} already absent`)}`,
        "fi",
    ]);
}

/**
 * Builds the scripts for a group descriptor.
 * An existing group is left alone; its gid is only applied on creation.
 */
export function groupScripts(descriptor: GroupDescriptor): CommandScripts {
    const { name, gid, isSystem, ensure } = descriptor;

    if (ensure === "absent") {
        return { create: removeGroupScript(name) };
    }

    const flags = [isSystem && "--system", gid !== undefined && `--gid ${gid}`]
        .filter((flag): flag is string => typeof flag === "string")
        .map((flag) => `${flag} `)
        .join("");
    const quoted = shellQuote(name);

    return {
        create: script([
            `if ! getent group ${quoted} >/dev/null; then`,
            `    groupadd ${flags}${quoted}`,
            `    echo ${shellQuote(`Group ${name} created`)}`,
            "else",
            `    echo ${shellQuote(`Group ${name} already exists`)}`,
            "fi",
        ]),
        delete: removeGroupScript(name),
    };
}
