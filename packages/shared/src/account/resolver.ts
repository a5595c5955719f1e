/**
 * Account resolver
 *
 * Turns validated parameters into a fully-defaulted AccountSpec. Defaulting
 * happens once here and is never re-checked downstream.
 */

import * as path from "node:path";
import {
    type AccountParams,
    type AccountSpec,
    type Ensure,
    type Warning,
    DEFAULT_GID,
    DEFAULT_HOME_DIR_PERMS,
    DEFAULT_PASSWORD,
    DEFAULT_SHELL,
} from "../types";
import { ValidationError } from "./errors";

export interface ResolvedAccount {
    spec: AccountSpec;
    warnings: Warning[];
}

const MODE_PATTERN = /^[0-7]{3,4}$/;

/**
 * Accepts "present" / "absent" in any letter case
 */
export function normalizeEnsure(value: string | undefined): Ensure {
    if (value === undefined) {
        return "present";
    }
    const normalized = value.toLowerCase();
    if (normalized === "present" || normalized === "absent") {
        return normalized;
    }
    throw new ValidationError("ensure", `ensure must be "present" or "absent", got "${value}"`);
}

/**
 * Default home directory for a user on the given OS family
 */
export function defaultHomeDir(username: string, osFamily: string): string {
    if (osFamily === "Solaris") {
        return username === "root" ? "/" : `/export/home/${username}`;
    }
    return username === "root" ? "/root" : `/home/${username}`;
}

/**
 * Resolves the real home directory: the override when given, the OS default otherwise
 */
export function resolveHomeDir(username: string, override: string | undefined, osFamily: string): string {
    if (override === undefined) {
        return defaultHomeDir(username, osFamily);
    }
    if (!path.posix.isAbsolute(override)) {
        throw new ValidationError("home_dir", `home_dir must be an absolute path, got "${override}"`);
    }
    const normalized = path.posix.normalize(override);
    return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

/**
 * Resolves validated parameters into a canonical AccountSpec.
 *
 * A gid supplied together with create_group=true is ignored: the dedicated
 * group always becomes the primary group.
 */
export function resolveAccount(params: AccountParams, osFamily: string): ResolvedAccount {
    const { username } = params;
    const ensure = normalizeEnsure(params.ensure);

    const homeDirPerms = params.home_dir_perms ?? DEFAULT_HOME_DIR_PERMS;
    if (!MODE_PATTERN.test(homeDirPerms)) {
        throw new ValidationError(
            "home_dir_perms",
            `home_dir_perms must be an octal mode such as "0750", got "${homeDirPerms}"`
        );
    }

    const createGroup = params.create_group ?? true;
    const gid = params.gid ?? DEFAULT_GID;

    const spec: AccountSpec = Object.freeze({
        username,
        uid: params.uid,
        password: params.password ?? DEFAULT_PASSWORD,
        shell: params.shell ?? DEFAULT_SHELL,
        manageHome: params.manage_home ?? false,
        homeDirPerms,
        createGroup,
        system: params.system ?? false,
        groups: Object.freeze([...new Set(params.groups ?? [])]),
        ensure,
        comment: params.comment ?? `${username} managed user`,
        gid,
        allowDuplicateUid: params.allowdupe ?? false,
        primaryGroup: createGroup ? username : gid,
        homeDir: resolveHomeDir(username, params.home_dir, osFamily),
    });

    return { spec, warnings: [] };
}
