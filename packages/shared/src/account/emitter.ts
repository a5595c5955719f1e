/**
 * Resource Emitter
 *
 * Turns ordered operations into descriptors for the convergence engine.
 * Each descriptor names the descriptors of the closest preceding rank in
 * `requires`, which encodes the partial order as a DAG.
 */

import type { ResourceDescriptor, ResourceOp } from "../types";

function toDescriptor(op: ResourceOp, requires: readonly string[]): ResourceDescriptor {
    const base = { id: op.id, ensure: op.ensure, requires };
    switch (op.kind) {
        case "group":
            return { ...op.payload, ...base, kind: "group" };
        case "user":
            return { ...op.payload, ...base, kind: "user" };
        case "homeDir":
            return { ...op.payload, ...base, kind: "directory", role: "home" };
        case "sshDir":
            return { ...op.payload, ...base, kind: "directory", role: "ssh" };
        case "sshKey":
            return { ...op.payload, ...base, kind: "sshKey" };
    }
}

export function emitDescriptors(ops: readonly ResourceOp[]): ResourceDescriptor[] {
    const idsByRank = new Map<number, string[]>();
    for (const op of ops) {
        const ids = idsByRank.get(op.rank) ?? [];
        ids.push(op.id);
        idsByRank.set(op.rank, ids);
    }
    const ranks = [...idsByRank.keys()].sort((a, b) => a - b);

    return ops.map((op) => {
        const previousRank = ranks.filter((rank) => rank < op.rank).pop();
        const requires = previousRank === undefined ? [] : (idsByRank.get(previousRank) ?? []);
        return Object.freeze(toDescriptor(op, Object.freeze([...requires])));
    });
}
