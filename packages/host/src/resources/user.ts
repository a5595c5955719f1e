/**
 * User resource
 *
 * Creates the account with useradd, or brings an existing account in line
 * with usermod. The password is handed over through the ACCOUNT_PASSWORD
 * environment variable so it stays out of the command text.
 */

import type { UserDescriptor } from "@accountsmith/shared";
import { type CommandScripts, script, shellQuote } from "../lib/command";

export const PASSWORD_ENV = "ACCOUNT_PASSWORD";

function removeUserScript(name: string): string {
    const quoted = shellQuote(name);
    return script([
        `if id -u ${quoted} >/dev/null 2>&1; then`,
        `    userdel ${quoted}`,
        `    echo ${shellQuote(`User ${name} removed`)}`,
        "else",
        `    echo ${shellQuote(`User ${name} already absent`)}`,
        "fi",
    ]);
}

/**
 * Flags shared by useradd and usermod
 */
function attributeFlags(descriptor: UserDescriptor): string[] {
    const flags = [
        `-g ${shellQuote(descriptor.primaryGroup)}`,
        `-s ${shellQuote(descriptor.shell)}`,
        `-c ${shellQuote(descriptor.comment)}`,
        `-d ${shellQuote(descriptor.home)}`,
    ];
    if (descriptor.uid !== undefined) {
        flags.push(`-u ${descriptor.uid}`);
        // useradd/usermod reject a taken uid unless told otherwise
        if (descriptor.allowDuplicateUid) {
            flags.push("-o");
        }
    }
    return flags;
}

/**
 * Builds the scripts for a user descriptor
 */
export function userScripts(descriptor: UserDescriptor): CommandScripts {
    const { name, ensure, supplementaryGroups, isSystem, manageHomeCopy } = descriptor;

    if (ensure === "absent") {
        return { create: removeUserScript(name) };
    }

    const quoted = shellQuote(name);
    const groups = shellQuote(supplementaryGroups.join(","));
    const addFlags = [
        isSystem && "--system",
        manageHomeCopy ? "--create-home" : "--no-create-home",
        ...attributeFlags(descriptor),
        supplementaryGroups.length > 0 && `-G ${groups}`,
    ].filter((flag): flag is string => typeof flag === "string");
    // usermod -G replaces the full list, so an empty list clears stale memberships
    const modFlags = [...attributeFlags(descriptor), `-G ${groups}`];

    return {
        create: script([
            `if id -u ${quoted} >/dev/null 2>&1; then`,
            `    usermod ${modFlags.join(" ")} ${quoted}`,
            `    echo ${shellQuote(`User ${name} updated`)}`,
            "else",
            `    useradd ${addFlags.join(" ")} ${quoted}`,
            `    echo ${shellQuote(`User ${name} created`)}`,
            "fi",
            `usermod -p "$${PASSWORD_ENV}" ${quoted}`,
        ]),
        delete: removeUserScript(name),
    };
}
