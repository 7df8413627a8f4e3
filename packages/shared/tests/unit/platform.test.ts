/**
 * Unit tests for host checks
 *
 * Uses process.platform and process.getuid mocking to simulate the
 * TrueNAS host and other machines.
 */

import { describe, it, expect, vi, afterEach } from "vitest";

// Use vi.hoisted so mock functions are available when vi.mock factory runs
const { mockUserInfo, mockHostname } = vi.hoisted(() => ({
    mockUserInfo: vi.fn(() => ({
        username: "admin",
        uid: 950,
        gid: 950,
        shell: "/usr/bin/zsh",
        homedir: "/home/admin",
    })),
    mockHostname: vi.fn(() => "truenas"),
}));

vi.mock("node:os", () => ({
    userInfo: mockUserInfo,
    hostname: mockHostname,
}));

import {
    isLinux,
    isRoot,
    getCurrentUsername,
    assertProvisioningHost,
    logBanner,
} from "../../src/platform.js";

describe("Host checks", () => {
    const originalPlatform = process.platform;
    const originalGetuid = process.getuid;

    function setUid(uid: number): void {
        Object.defineProperty(process, "getuid", { value: () => uid, configurable: true });
    }

    afterEach(() => {
        Object.defineProperty(process, "platform", { value: originalPlatform });
        Object.defineProperty(process, "getuid", { value: originalGetuid, configurable: true });
        vi.restoreAllMocks();
    });

    describe("isLinux", () => {
        it("should return true on Linux", () => {
            Object.defineProperty(process, "platform", { value: "linux" });
            expect(isLinux()).toBe(true);
        });

        it("should return false on macOS", () => {
            Object.defineProperty(process, "platform", { value: "darwin" });
            expect(isLinux()).toBe(false);
        });
    });

    describe("isRoot", () => {
        it("should return true for uid 0", () => {
            setUid(0);
            expect(isRoot()).toBe(true);
        });

        it("should return false for other uids", () => {
            setUid(950);
            expect(isRoot()).toBe(false);
        });
    });

    describe("getCurrentUsername", () => {
        it("should return the username from os.userInfo()", () => {
            expect(getCurrentUsername()).toBe("admin");
        });
    });

    describe("assertProvisioningHost", () => {
        it("should not throw for root on Linux", () => {
            Object.defineProperty(process, "platform", { value: "linux" });
            setUid(0);
            expect(() => assertProvisioningHost()).not.toThrow();
        });

        it("should point to the REST apply on other platforms", () => {
            Object.defineProperty(process, "platform", { value: "darwin" });
            expect(() => assertProvisioningHost()).toThrow(
                "Shell-mode provisioning only runs on the TrueNAS SCALE host (Linux), not darwin."
            );
            expect(() => assertProvisioningHost()).toThrow("tankctl apply");
        });

        it("should require root unless told otherwise", () => {
            Object.defineProperty(process, "platform", { value: "linux" });
            setUid(950);
            expect(() => assertProvisioningHost()).toThrow(
                "This program must be run as root (current user: admin)"
            );
            expect(() => assertProvisioningHost(false)).not.toThrow();
        });
    });

    describe("logBanner", () => {
        it("should log the pool and host name", () => {
            const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});

            logBanner("tank");

            const output = consoleSpy.mock.calls.map((call) => call[0]).join("\n");
            expect(output).toContain("tankctl - Provisioning pool 'tank' on truenas");
            expect(output).toContain("====");
        });
    });
});
