/**
 * Dependency Planner
 *
 * Builds the partially ordered list of resource operations for one account.
 *
 * present: group -> user -> home dir -> .ssh dir -> keys
 * absent:  keys -> .ssh dir -> home dir -> user -> group
 *
 * Operations within one rank (the key entries) are unordered relative to
 * each other. The group only appears when the account has a dedicated group.
 */

import * as path from "node:path";
import {
    type AccountSpec,
    type DirectoryPayload,
    type ResourceOp,
    type SSHKeyEntry,
    SSH_DIR_MODE,
} from "../types";

/** Builds an operation once its rank is known */
type OpFactory = (rank: number) => ResourceOp;

export const resourceIds = {
    group: (name: string) => `group:${name}`,
    user: (name: string) => `user:${name}`,
    directory: (dirPath: string) => `directory:${dirPath}`,
    sshKey: (name: string) => `ssh-key:${name}`,
} as const;

export function sshDirPath(homeDir: string): string {
    return path.posix.join(homeDir, ".ssh");
}

function directoryPayload(spec: AccountSpec, dirPath: string, mode: string): DirectoryPayload {
    if (spec.ensure === "absent") {
        return { path: dirPath };
    }
    return { path: dirPath, owner: spec.username, group: spec.primaryGroup, mode };
}

function freezeOp(op: ResourceOp): ResourceOp {
    Object.freeze(op.payload);
    return Object.freeze(op);
}

export function planAccount(spec: AccountSpec, keys: readonly SSHKeyEntry[]): ResourceOp[] {
    const { ensure } = spec;
    const sshDir = sshDirPath(spec.homeDir);

    const groupClass: OpFactory[] = spec.createGroup
        ? [
              (rank) => ({
                  kind: "group",
                  id: resourceIds.group(spec.username),
                  ensure,
                  rank,
                  payload: { name: spec.username, gid: spec.uid, isSystem: spec.system },
              }),
          ]
        : [];

    const userClass: OpFactory[] = [
        (rank) => ({
            kind: "user",
            id: resourceIds.user(spec.username),
            ensure,
            rank,
            payload: {
                name: spec.username,
                uid: spec.uid,
                primaryGroup: spec.primaryGroup,
                supplementaryGroups: spec.groups,
                shell: spec.shell,
                comment: spec.comment,
                password: spec.password,
                home: spec.homeDir,
                manageHomeCopy: spec.manageHome,
                isSystem: spec.system,
                allowDuplicateUid: spec.allowDuplicateUid,
            },
        }),
    ];

    const homeDirClass: OpFactory[] = [
        (rank) => ({
            kind: "homeDir",
            id: resourceIds.directory(spec.homeDir),
            ensure,
            rank,
            payload: directoryPayload(spec, spec.homeDir, spec.homeDirPerms),
        }),
    ];

    const sshDirClass: OpFactory[] = [
        (rank) => ({
            kind: "sshDir",
            id: resourceIds.directory(sshDir),
            ensure,
            rank,
            payload: directoryPayload(spec, sshDir, SSH_DIR_MODE),
        }),
    ];

    const keyClass: OpFactory[] = keys.map(
        (entry): OpFactory =>
            (rank) => ({
                kind: "sshKey",
                id: resourceIds.sshKey(entry.name),
                ensure: entry.ensure,
                rank,
                payload: { name: entry.name, owner: entry.owner, type: entry.type, key: entry.key },
            })
    );

    const creationOrder = [groupClass, userClass, homeDirClass, sshDirClass, keyClass];
    const classes = ensure === "present" ? creationOrder : [...creationOrder].reverse();

    const operations: ResourceOp[] = [];
    let rank = 0;
    for (const opClass of classes) {
        if (opClass.length === 0) continue;
        for (const build of opClass) {
            operations.push(freezeOp(build(rank)));
        }
        rank++;
    }
    return operations;
}
