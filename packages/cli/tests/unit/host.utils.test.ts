/**
 * Unit tests for host.utils.ts
 *
 * execa is mocked; only the pulumi arguments and working directory are checked.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import * as path from "node:path";

const { mockExeca } = vi.hoisted(() => ({
    mockExeca: vi.fn(async () => ({ exitCode: 0 })),
}));

vi.mock("execa", () => ({
    execa: mockExeca,
}));

import {
    getHostPackageDir,
    removePulumiConfig,
    runPulumiUp,
    setPulumiConfig,
} from "../../src/utils/host.utils";

describe("host.utils", () => {
    afterEach(() => {
        mockExeca.mockClear();
    });

    it("should locate the host package beside the cli package", () => {
        expect(path.basename(getHostPackageDir())).toBe("host");
        expect(path.basename(path.dirname(getHostPackageDir()))).toBe("packages");
    });

    it("should store a secret config value encrypted", async () => {
        await setPulumiConfig("accounts", "{}", { stack: "dev", secret: true });

        expect(mockExeca).toHaveBeenCalledWith(
            "pulumi",
            ["config", "set", "accountsmith:accounts", "{}", "--secret", "--stack", "dev"],
            { cwd: getHostPackageDir(), stdio: "inherit" }
        );
    });

    it("should store plain values without --secret", async () => {
        await setPulumiConfig("os-family", "Debian");

        expect(mockExeca).toHaveBeenCalledWith(
            "pulumi",
            ["config", "set", "accountsmith:os-family", "Debian"],
            { cwd: getHostPackageDir(), stdio: "inherit" }
        );
    });

    it("should remove a config key", async () => {
        await removePulumiConfig("os-family", "prod");

        expect(mockExeca).toHaveBeenCalledWith(
            "pulumi",
            ["config", "rm", "accountsmith:os-family", "--stack", "prod"],
            { cwd: getHostPackageDir(), stdio: "inherit" }
        );
    });

    it("should pass --yes to pulumi up when asked", async () => {
        await runPulumiUp({ yes: true });

        expect(mockExeca).toHaveBeenCalledWith("pulumi", ["up", "--yes"], {
            cwd: getHostPackageDir(),
            stdio: "inherit",
        });
    });
});
