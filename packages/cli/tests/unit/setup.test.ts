/**
 * Unit tests for the setup wizard
 *
 * Prompts and the pulumi binary are mocked; the tests check what ends up in
 * `pulumi config set`.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { mockExeca, mockInput, mockPassword, mockConfirm } = vi.hoisted(() => ({
    mockExeca: vi.fn(),
    mockInput: vi.fn(),
    mockPassword: vi.fn(),
    mockConfirm: vi.fn(),
}));

vi.mock("execa", () => ({
    execa: mockExeca,
}));

vi.mock("@inquirer/prompts", () => ({
    input: mockInput,
    password: mockPassword,
    confirm: mockConfirm,
}));

import { promptSetup, runSetup, saveSetup, type SetupAnswers } from "../../src/commands/setup.js";

function configSets(): string[][] {
    return mockExeca.mock.calls
        .map((call): unknown[] => (Array.isArray(call[1]) ? call[1] : []))
        .filter((args) => args[0] === "config" && args[1] === "set")
        .map((args) => args.slice(2).map(String));
}

describe("setup", () => {
    beforeEach(() => {
        mockExeca.mockReset();
        mockInput.mockReset();
        mockPassword.mockReset();
        mockConfirm.mockReset();
        mockExeca.mockResolvedValue({ exitCode: 0, stdout: "nas" });
        mockPassword.mockResolvedValue("test-secret");
        vi.spyOn(console, "log").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe("promptSetup()", () => {
        it("should ask for the layout when defaults are declined", async () => {
            mockInput
                .mockResolvedValueOnce(" nas.lan ")
                .mockResolvedValueOnce("fast")
                .mockResolvedValueOnce("/data")
                .mockResolvedValueOnce("/root/tankctl");
            // HTTPS, defaults, ACL grants
            mockConfirm.mockResolvedValueOnce(false).mockResolvedValueOnce(false).mockResolvedValueOnce(false);

            const answers = await promptSetup();

            expect(answers).toEqual({
                host: "nas.lan",
                scheme: "http",
                insecureTls: false,
                apiKey: "test-secret",
                pool: "fast",
                mountRoot: "/data",
                helperDir: "/root/tankctl",
                skipAcl: true,
            });
        });
    });

    describe("saveSetup()", () => {
        it("should store the API key as a secret", async () => {
            const answers: SetupAnswers = {
                host: "nas.lan",
                scheme: "https",
                insecureTls: true,
                apiKey: "test-secret",
                pool: "tank",
                mountRoot: "/mnt",
                helperDir: "/root",
                skipAcl: false,
            };

            await saveSetup(answers);

            expect(configSets()).toEqual([
                ["tankctl:truenas-host", "nas.lan"],
                ["tankctl:truenas-scheme", "https"],
                ["tankctl:truenas-insecure-tls", "true"],
                ["tankctl:truenas-api-key", "test-secret", "--secret"],
                ["tankctl:pool", "tank"],
                ["tankctl:mount-root", "/mnt"],
                ["tankctl:helper-dir", "/root"],
                ["tankctl:skip-acl", "false"],
            ]);
            expect(mockExeca).toHaveBeenCalledWith(
                "pulumi",
                ["config", "set", "tankctl:truenas-api-key", "test-secret", "--secret"],
                { stdio: "inherit" }
            );
        });
    });

    describe("runSetup()", () => {
        it("should create a stack when there is none", async () => {
            mockExeca.mockResolvedValueOnce({ exitCode: 255, stdout: "" });
            mockInput.mockResolvedValueOnce("nas").mockResolvedValueOnce("nas.lan").mockResolvedValueOnce("tank");
            // HTTPS, self-signed, defaults, save
            mockConfirm
                .mockResolvedValueOnce(true)
                .mockResolvedValueOnce(false)
                .mockResolvedValueOnce(true)
                .mockResolvedValueOnce(true);

            await runSetup();

            expect(mockExeca).toHaveBeenCalledWith("pulumi", ["stack", "init", "nas"], { stdio: "inherit" });
            expect(configSets()).toHaveLength(8);
            expect(configSets()[0]).toEqual(["tankctl:truenas-host", "nas.lan"]);
        });

        it("should save nothing when cancelled", async () => {
            mockInput.mockResolvedValueOnce("nas.lan").mockResolvedValueOnce("tank");
            mockConfirm
                .mockResolvedValueOnce(true)
                .mockResolvedValueOnce(false)
                .mockResolvedValueOnce(true)
                .mockResolvedValueOnce(false);

            await runSetup();

            expect(configSets()).toEqual([]);
            expect(console.log).toHaveBeenCalledWith("\nSetup cancelled.\n");
        });
    });
});
