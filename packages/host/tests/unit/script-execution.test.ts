/**
 * Runs the generated resource scripts under sh
 *
 * Account tools (getent, groupadd, useradd, chown, ...) are replaced by stub
 * executables on PATH that record state in a temp directory, so the scripts
 * can be exercised for re-runs, failures and concurrent key entries.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { execa } from "execa";
import type {
    DirectoryDescriptor,
    GroupDescriptor,
    SSHKeyDescriptor,
    UserDescriptor,
} from "@accountsmith/shared";
import { groupScripts } from "../../src/resources/group";
import { userScripts } from "../../src/resources/user";
import { directoryScripts } from "../../src/resources/directories";
import { sshKeyScripts } from "../../src/resources/ssh-key";

const STUBS: Record<string, string> = {
    getent: '[ -e "$STATE_DIR/$1.$2" ]',
    groupadd: 'for last; do :; done\ntouch "$STATE_DIR/group.$last"',
    groupdel: 'rm "$STATE_DIR/group.$1"',
    id: '[ -e "$STATE_DIR/passwd.$2" ]',
    useradd: 'for last; do :; done\ntouch "$STATE_DIR/passwd.$last"',
    usermod: 'echo "usermod $*" >> "$STATE_DIR/usermod.log"',
    userdel: 'rm "$STATE_DIR/passwd.$1"',
    chown: 'echo "chown $*" >> "$STATE_DIR/chown.log"',
};

function group(ensure: "present" | "absent"): GroupDescriptor {
    return {
        kind: "group",
        id: "group:alice",
        ensure,
        requires: [],
        name: "alice",
        gid: 1000,
        isSystem: false,
    };
}

function user(ensure: "present" | "absent"): UserDescriptor {
    return {
        kind: "user",
        id: "user:alice",
        ensure,
        requires: ["group:alice"],
        name: "alice",
        uid: 1000,
        primaryGroup: "alice",
        supplementaryGroups: [],
        shell: "/bin/bash",
        comment: "alice managed user",
        password: "!!",
        home: "/home/alice",
        manageHomeCopy: false,
        isSystem: false,
        allowDuplicateUid: false,
    };
}

function sshKey(label: string, ensure: "present" | "absent" = "present"): SSHKeyDescriptor {
    return {
        kind: "sshKey",
        id: `ssh-key:alice:${label}`,
        ensure,
        requires: [],
        name: `alice:${label}`,
        owner: "alice",
        type: "ssh-ed25519",
        key: `AAAA-${label}`,
    };
}

describe.skipIf(process.platform === "win32")("resource scripts under sh", () => {
    let root: string;
    let binDir: string;
    let stateDir: string;

    function stub(name: string, body: string): void {
        fs.writeFileSync(path.join(binDir, name), `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    }

    function failingStub(name: string, message: string, code: number): void {
        stub(name, `echo ${JSON.stringify(message)} >&2\nexit ${code}`);
    }

    function run(body: string) {
        return execa("sh", ["-c", body], {
            env: {
                PATH: `${binDir}${path.delimiter}${process.env.PATH ?? ""}`,
                STATE_DIR: stateDir,
                ACCOUNT_PASSWORD: "!!",
            },
            reject: false,
        });
    }

    function stateFile(name: string): string {
        return path.join(stateDir, name);
    }

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), "resource-scripts-"));
        binDir = path.join(root, "bin");
        stateDir = path.join(root, "state");
        fs.mkdirSync(binDir);
        fs.mkdirSync(stateDir);
        for (const [name, body] of Object.entries(STUBS)) {
            stub(name, body);
        }
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    describe("group", () => {
        it("should create the group once and report it on re-runs", async () => {
            const { create } = groupScripts(group("present"));

            const first = await run(create);
            const second = await run(create);

            expect(first.exitCode).toBe(0);
            expect(first.stdout).toBe("Group alice created");
            expect(fs.existsSync(stateFile("group.alice"))).toBe(true);
            expect(second.stdout).toBe("Group alice already exists");
        });

        it("should fail when groupadd fails", async () => {
            failingStub("groupadd", "groupadd: GID '1000' already exists", 4);

            const result = await run(groupScripts(group("present")).create);

            expect(result.exitCode).toBe(4);
            expect(result.stdout).toBe("");
            expect(result.stderr).toBe("groupadd: GID '1000' already exists");
        });

        it("should fail when groupdel refuses to remove the group", async () => {
            fs.writeFileSync(stateFile("group.alice"), "");
            failingStub("groupdel", "groupdel: cannot remove the primary group of user 'bob'", 8);

            const result = await run(groupScripts(group("absent")).create);

            expect(result.exitCode).toBe(8);
            expect(result.stdout).toBe("");
        });
    });

    describe("user", () => {
        it("should add the user, then modify it on re-runs", async () => {
            const { create } = userScripts(user("present"));

            const first = await run(create);
            const second = await run(create);

            expect(first.exitCode).toBe(0);
            expect(first.stdout).toBe("User alice created");
            expect(second.stdout).toBe("User alice updated");
            expect(fs.readFileSync(stateFile("usermod.log"), "utf-8").split("\n")).toEqual([
                "usermod -p !! alice",
                "usermod -g alice -s /bin/bash -c alice managed user -d /home/alice -u 1000 -G  alice",
                "usermod -p !! alice",
                "",
            ]);
        });

        it("should fail when useradd fails", async () => {
            failingStub("useradd", "useradd: UID 1000 is not unique", 4);

            const result = await run(userScripts(user("present")).create);

            expect(result.exitCode).toBe(4);
            expect(fs.existsSync(stateFile("usermod.log"))).toBe(false);
        });

        it("should fail when userdel fails", async () => {
            fs.writeFileSync(stateFile("passwd.alice"), "");
            failingStub("userdel", "userdel: user alice is currently used by process 1", 8);

            const result = await run(userScripts(user("absent")).create);

            expect(result.exitCode).toBe(8);
            expect(result.stdout).toBe("");
        });
    });

    describe("directory", () => {
        function home(ensure: "present" | "absent"): DirectoryDescriptor {
            const dirPath = path.join(root, "home", "alice");
            const base = { kind: "directory", role: "home", id: `directory:${dirPath}`, requires: [] } as const;
            return ensure === "present"
                ? { ...base, ensure, path: dirPath, owner: "alice", group: "alice", mode: "0750" }
                : { ...base, ensure, path: dirPath };
        }

        it("should converge ownership and mode on every run", async () => {
            const descriptor = home("present");
            const { create } = directoryScripts(descriptor);

            expect((await run(create)).exitCode).toBe(0);
            fs.chmodSync(descriptor.path, 0o777);
            const second = await run(create);

            expect(second.exitCode).toBe(0);
            expect(fs.statSync(descriptor.path).mode & 0o777).toBe(0o750);
            expect(fs.readFileSync(stateFile("chown.log"), "utf-8")).toBe(
                `chown alice:alice ${descriptor.path}\n`.repeat(2)
            );
        });

        it("should fail when chown fails", async () => {
            failingStub("chown", "chown: invalid user: 'alice:alice'", 1);

            const result = await run(directoryScripts(home("present")).create);

            expect(result.exitCode).toBe(1);
            expect(result.stdout).toBe("");
        });

        it("should remove the directory and be a no-op afterwards", async () => {
            const descriptor = home("absent");
            fs.mkdirSync(path.join(descriptor.path, ".ssh"), { recursive: true });
            const { create } = directoryScripts(descriptor);

            const first = await run(create);
            const second = await run(create);

            expect(first.exitCode).toBe(0);
            expect(fs.existsSync(descriptor.path)).toBe(false);
            expect(second.stdout).toBe(`Directory ${descriptor.path} already absent`);
        });
    });

    describe("authorized keys", () => {
        const handwritten = "ssh-rsa AAAA-handwritten admin@workstation";
        let sshDir: string;
        let file: string;

        beforeEach(() => {
            sshDir = path.join(root, "home", "alice", ".ssh");
            file = path.join(sshDir, "authorized_keys");
            fs.mkdirSync(sshDir, { recursive: true });
        });

        function keyLines(): string[] {
            return fs
                .readFileSync(file, "utf-8")
                .split("\n")
                .filter((line) => line !== "");
        }

        it(
            "should keep every entry when the entries of one rank run concurrently",
            async () => {
                const labels = ["laptop", "desktop", "phone"];
                const scripts = labels.map((label) => sshKeyScripts(sshKey(label), file).create);

                for (let round = 0; round < 15; round++) {
                    fs.writeFileSync(file, `${handwritten}\n`);

                    const results = await Promise.all(scripts.map((body) => run(body)));

                    expect(results.map((r) => r.exitCode)).toEqual([0, 0, 0]);
                    expect([...keyLines()].sort()).toEqual(
                        [
                            handwritten,
                            "ssh-ed25519 AAAA-laptop alice:laptop",
                            "ssh-ed25519 AAAA-desktop alice:desktop",
                            "ssh-ed25519 AAAA-phone alice:phone",
                        ].sort()
                    );
                    expect(fs.readdirSync(sshDir)).toEqual(["authorized_keys"]);
                }
            },
            30_000
        );

        it("should hold one line per entry across re-runs", async () => {
            const { create } = sshKeyScripts(sshKey("laptop"), file);

            await run(create);
            const second = await run(create);

            expect(second.exitCode).toBe(0);
            expect(keyLines()).toEqual(["ssh-ed25519 AAAA-laptop alice:laptop"]);
            expect(fs.statSync(file).mode & 0o777).toBe(0o600);
        });

        it("should remove only its own line and keep the file mode", async () => {
            fs.writeFileSync(
                file,
                [
                    handwritten,
                    "ssh-ed25519 AAAA-laptop alice:laptop",
                    "ssh-ed25519 AAAA-laptop2 alice:laptop2",
                    "",
                ].join("\n"),
                { mode: 0o600 }
            );

            const result = await run(sshKeyScripts(sshKey("laptop", "absent"), file).create);

            expect(result.exitCode).toBe(0);
            expect(keyLines()).toEqual([handwritten, "ssh-ed25519 AAAA-laptop2 alice:laptop2"]);
            expect(fs.statSync(file).mode & 0o777).toBe(0o600);
            expect(fs.readdirSync(sshDir)).toEqual(["authorized_keys"]);
        });

        it("should fail instead of writing when the .ssh directory is missing", async () => {
            fs.rmSync(sshDir, { recursive: true });
            const { create } = sshKeyScripts(sshKey("laptop"), file);

            const result = await run(create.replace("-ge 300", "-ge 2"));

            expect(result.exitCode).toBe(1);
            expect(result.stderr).toBe(`Timed out waiting for ${file}.lock`);
        });
    });
});
