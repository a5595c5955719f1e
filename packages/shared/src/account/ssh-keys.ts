/**
 * SSH Key Consolidator
 *
 * Merges the deprecated single-key parameters (ssh_key / ssh_key_type) and
 * the ssh_keys mapping into one list of authorized-key entries.
 */

import {
    type Ensure,
    type SSHKeyEntry,
    type SSHKeyParam,
    type Warning,
    DEFAULT_SSH_KEY_TYPE,
} from "../types";
import { ValidationError } from "./errors";

export interface ConsolidateSSHKeysInput {
    username: string;
    ensure: Ensure;
    /** Deprecated single key material */
    legacyKey?: string;
    /** Deprecated single key type */
    legacyType?: string;
    keyMapping?: Record<string, SSHKeyParam>;
}

export interface ConsolidatedSSHKeys {
    entries: SSHKeyEntry[];
    warnings: Warning[];
}

export function legacyKeyName(username: string): string {
    return `${username} SSH Key`;
}

export function mappedKeyName(username: string, label: string): string {
    return `${username}:${label}`;
}

/**
 * Consolidates both key sources. The legacy key is declared first, then
 * mapping entries in declaration order; on a name collision the entry
 * declared last wins.
 */
export function consolidateSSHKeys(input: ConsolidateSSHKeysInput): ConsolidatedSSHKeys {
    const { username, ensure, legacyKey, legacyType, keyMapping } = input;
    const byName = new Map<string, SSHKeyEntry>();
    const warnings: Warning[] = [];

    const declare = (name: string, type: string | undefined, key: string): void => {
        byName.set(
            name,
            Object.freeze({
                name,
                type: type?.trim() || DEFAULT_SSH_KEY_TYPE,
                key,
                owner: username,
                ensure,
            })
        );
    };

    const legacyMaterial = legacyKey?.trim();
    if (legacyMaterial) {
        declare(legacyKeyName(username), legacyType, legacyMaterial);
        warnings.push({
            code: "deprecated-parameter",
            parameter: "ssh_key",
            message: `ssh_key is deprecated for ${username}; declare keys in ssh_keys instead`,
        });
    } else if (legacyType !== undefined) {
        warnings.push({
            code: "deprecated-parameter",
            parameter: "ssh_key_type",
            message: `ssh_key_type is deprecated for ${username} and has no effect without ssh_key`,
        });
    }

    for (const [rawLabel, param] of Object.entries(keyMapping ?? {})) {
        const label = rawLabel.trim();
        if (!label) {
            throw new ValidationError("ssh_keys", "ssh_keys labels must not be empty");
        }
        const material = param.key?.trim();
        if (!material) {
            throw new ValidationError(
                `ssh_keys.${label}.key`,
                `ssh_keys entry "${label}" is missing key material`
            );
        }
        declare(mappedKeyName(username, label), param.type, material);
    }

    return { entries: [...byName.values()], warnings };
}
