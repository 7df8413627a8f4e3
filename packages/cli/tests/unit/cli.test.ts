/**
 * Unit tests for the top-level command line
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { mockExeca } = vi.hoisted(() => ({
    mockExeca: vi.fn(),
}));

vi.mock("execa", () => ({
    execa: mockExeca,
}));

import { loadCatalog, renderDockerEnv } from "@tankctl/shared";
import { runCli } from "../../src/cli.js";

describe("runCli", () => {
    beforeEach(() => {
        mockExeca.mockReset();
        mockExeca.mockResolvedValue({ exitCode: 1, stdout: "" });
        vi.stubEnv("TANKCTL_QUIET", "1");
        vi.stubEnv("TANKCTL_POOL", "tank");
        vi.stubEnv("TANKCTL_MOUNT_ROOT", "/mnt");
        vi.stubEnv("TRUENAS_HOST", "");
        vi.stubEnv("TRUENAS_API_KEY", "");
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        process.exitCode = undefined;
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
    });

    it("should print errors with a cross and exit 1", async () => {
        await runCli(["plan", "--only", "bogus"]);

        expect(console.error).toHaveBeenCalledWith(
            "✗ Unknown stage 'bogus' in --only (expected one of: groups, datasets, users, permissions, snapshots, tunables)"
        );
        expect(process.exitCode).toBe(1);
    });

    it("should require a command", async () => {
        await runCli([]);

        expect(console.error).toHaveBeenCalledWith(
            "✗ Please specify a command. Run tankctl --help for available commands."
        );
        expect(process.exitCode).toBe(1);
    });

    it("should report a missing connection before contacting anything", async () => {
        await runCli(["apply", "--only", "groups"]);

        expect(console.error).toHaveBeenCalledWith(
            "✗ TrueNAS host not set: pass --host, set TRUENAS_HOST, or run 'tankctl setup'"
        );
        expect(mockExeca).toHaveBeenCalledWith("pulumi", ["config", "get", "tankctl:truenas-host"], {
            reject: false,
        });
    });

    it("should run an offline command", async () => {
        const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

        await runCli(["export", "env"]);

        expect(process.exitCode).toBeUndefined();
        expect(write).toHaveBeenCalledWith(renderDockerEnv(loadCatalog()));
    });

    it("should reject an unknown export kind", async () => {
        await runCli(["export", "passwd"]);

        expect(process.exitCode).toBe(1);
        expect(console.error).toHaveBeenCalledTimes(1);
    });
});
