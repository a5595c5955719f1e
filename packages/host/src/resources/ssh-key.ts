/**
 * Authorized-key resource
 *
 * Each entry owns exactly one line of authorized_keys, identified by its
 * trailing comment (the entry name). Lines written by hand are left alone.
 *
 * Key entries of one account run in parallel, so every rewrite holds a
 * lock directory next to the file and works on its own mktemp copy.
 */

import type { SSHKeyDescriptor } from "@accountsmith/shared";
import { type CommandScripts, indent, script, shellQuote } from "../lib/command";

/** Attempts at 0.1s intervals before giving up on the lock */
const LOCK_ATTEMPTS = 300;

export function authorizedKeyLine(descriptor: SSHKeyDescriptor): string {
    return `${descriptor.type} ${descriptor.key} ${descriptor.name}`;
}

/**
 * Takes the authorized_keys lock and creates "$tmp"; both are released on exit
 */
function lockedTempFile(file: string): string[] {
    return [
        `lock=${shellQuote(`${file}.lock`)}`,
        'tmp=""',
        "attempt=0",
        'until mkdir "$lock" 2>/dev/null; do',
        "    attempt=$((attempt + 1))",
        `    if [ "$attempt" -ge ${LOCK_ATTEMPTS} ]; then`,
        `        echo "Timed out waiting for $lock" >&2`,
        "        exit 1",
        "    fi",
        "    sleep 0.1",
        "done",
        `trap 'rm -f "$tmp"; rmdir "$lock"' EXIT`,
        `tmp=$(mktemp ${shellQuote(`${file}.XXXXXX`)})`,
    ];
}

/**
 * awk filter that copies every line not ending in " <name>" into "$tmp"
 */
function dropEntryFilter(name: string, file: string): string {
    return (
        `awk -v s=${shellQuote(` ${name}`)} ` +
        `'substr($0, length($0) - length(s) + 1) != s' ${shellQuote(file)} > "$tmp"`
    );
}

function removeKeyScript(name: string, file: string): string {
    const quoted = shellQuote(file);
    return script([
        `if [ -f ${quoted} ]; then`,
        ...indent([
            ...lockedTempFile(file),
            dropEntryFilter(name, file),
            // Rewrite in place so the file keeps its owner and mode
            `cat "$tmp" > ${quoted}`,
        ]),
        "fi",
        `echo ${shellQuote(`SSH key ${name} absent`)}`,
    ]);
}

/**
 * Builds the scripts for an authorized-key descriptor
 *
 * @param authorizedKeysPath - authorized_keys file inside the account's .ssh directory
 */
export function sshKeyScripts(descriptor: SSHKeyDescriptor, authorizedKeysPath: string): CommandScripts {
    const { name, owner, ensure } = descriptor;

    if (ensure === "absent") {
        return { create: removeKeyScript(name, authorizedKeysPath) };
    }

    const quoted = shellQuote(authorizedKeysPath);

    return {
        create: script([
            ...lockedTempFile(authorizedKeysPath),
            `touch ${quoted}`,
            dropEntryFilter(name, authorizedKeysPath),
            `printf '%s\\n' ${shellQuote(authorizedKeyLine(descriptor))} >> "$tmp"`,
            `chown ${shellQuote(owner)} "$tmp"`,
            `chmod 600 "$tmp"`,
            `mv "$tmp" ${quoted}`,
            `echo ${shellQuote(`SSH key ${name} installed`)}`,
        ]),
        delete: removeKeyScript(name, authorizedKeysPath),
    };
}
