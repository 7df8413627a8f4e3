/**
 * Unit tests for the REST apply
 *
 * Runs applyCatalog against the in-process middleware and checks the
 * outcome of each row and the requests that reached the NAS.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { loadCatalog } from "@tankctl/shared";
import { applyCatalog, summarizeResults } from "../../src/apply.js";
import { FakeTrueNas } from "../support/fake-truenas.js";

const catalog = loadCatalog();

function writes(fake: FakeTrueNas): string[] {
    return fake.calls.filter((c) => c.method !== "GET" && !c.path.startsWith("/filesystem/stat")).map((c) => `${c.method} ${c.path}`);
}

describe("applyCatalog", () => {
    beforeEach(() => {
        vi.stubEnv("TANKCTL_QUIET", "1");
        vi.spyOn(console, "warn").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
    });

    it("should provision an empty system in apply order", async () => {
        const fake = new FakeTrueNas();
        const report = await applyCatalog(fake.client(), catalog);

        expect(report.aborted).toBe(false);
        expect(report.stages).toEqual(["groups", "datasets", "users", "permissions", "snapshots", "tunables"]);

        const summary = summarizeResults(report.results);
        expect(summary.get("groups")).toEqual({ created: 11, updated: 0, unchanged: 0, skipped: 0, failed: 0 });
        expect(summary.get("datasets")?.created).toBe(149);
        expect(summary.get("users")?.created).toBe(61);
        expect(summary.get("permissions")?.updated).toBe(125);
        expect(summary.get("snapshots")?.created).toBe(60);
        expect(summary.get("tunables")?.created).toBe(79);

        const firstUser = fake.calls.findIndex((c) => c.method === "POST" && c.path === "/user");
        const lastGroup = fake.calls.map((c) => `${c.method} ${c.path}`).lastIndexOf("POST /group");
        const lastDataset = fake.calls.map((c) => `${c.method} ${c.path}`).lastIndexOf("POST /pool/dataset");
        expect(lastGroup).toBeLessThan(firstUser);
        expect(lastDataset).toBeLessThan(firstUser);
    });

    it("should change nothing on a second run", async () => {
        const fake = new FakeTrueNas();
        await applyCatalog(fake.client(), catalog);
        fake.calls = [];

        const report = await applyCatalog(fake.client(), catalog);

        expect(report.results.filter((r) => r.outcome !== "unchanged")).toEqual([]);
        expect(writes(fake)).toEqual([]);
    });

    it("should create users with the internal group id and no login", async () => {
        const fake = new FakeTrueNas();
        await applyCatalog(fake.client(), catalog, { stages: ["groups", "datasets", "users"] });

        const media = fake.groups.find((g) => g.group === "media");
        const download = fake.groups.find((g) => g.group === "download");
        const plexCall = fake.callsTo("POST", "/user").find((c) => JSON.stringify(c.body).includes('"plex"'));
        expect(plexCall?.body).toEqual({
            username: "plex",
            uid: 3000,
            group: media?.id,
            group_create: false,
            groups: [],
            home: "/mnt/tank/apps/plex",
            home_create: false,
            full_name: "Plex Media Server",
            shell: "/usr/sbin/nologin",
            password_disabled: true,
            smb: false,
        });
        expect(media?.id).not.toBe(2000);

        const radarr = fake.users.find((u) => u.username === "radarr");
        expect(radarr?.groups).toEqual([download?.id]);
    });

    it("should create datasets with upper-case property values", async () => {
        const fake = new FakeTrueNas();
        await applyCatalog(fake.client(), catalog, { stages: ["datasets"] });

        const movies = fake.callsTo("POST", "/pool/dataset").find((c) => JSON.stringify(c.body).includes("tank/media/movies"));
        expect(movies?.body).toEqual({
            name: "tank/media/movies",
            type: "FILESYSTEM",
            recordsize: "1M",
            compression: "OFF",
            atime: "OFF",
            xattr: "SA",
        });
    });

    it("should only read during a dry run", async () => {
        const fake = new FakeTrueNas();
        const report = await applyCatalog(fake.client(), catalog, {
            stages: ["groups", "datasets"],
            dryRun: true,
        });

        expect(report.dryRun).toBe(true);
        expect(report.results).toHaveLength(160);
        expect(report.results.every((r) => r.outcome === "skipped")).toBe(true);
        expect(report.results[0]).toEqual({
            stage: "groups",
            key: "media",
            outcome: "skipped",
            detail: "would create gid 2000",
        });
        expect(writes(fake)).toEqual([]);
    });

    it("should report a full dry run on an empty system without failures", async () => {
        const fake = new FakeTrueNas();

        const report = await applyCatalog(fake.client(), catalog, { dryRun: true });

        expect(report.aborted).toBe(false);
        expect(report.results.filter((r) => r.outcome === "failed")).toEqual([]);
        expect(report.results.find((r) => r.stage === "permissions")).toEqual({
            stage: "permissions",
            key: "apps/plex",
            outcome: "skipped",
            detail: "would set after dataset creation",
        });
        expect(writes(fake)).toEqual([]);
    });

    it("should fail a permission row when stat errors for another reason", async () => {
        const fake = new FakeTrueNas();
        fake.failOn("POST", "/filesystem/stat", 500, "middleware exploded");

        const report = await applyCatalog(fake.client(), catalog, { stages: ["permissions"], dryRun: true });

        expect(report.results[0]).toEqual({
            stage: "permissions",
            key: "apps/plex",
            outcome: "failed",
            detail: "POST /filesystem/stat returned HTTP 500: middleware exploded",
        });
        expect(report.results[1].outcome).toBe("skipped");
    });

    it("should stop at the first failure", async () => {
        const fake = new FakeTrueNas();
        fake.failOn("POST", "/group", 500, "middleware exploded");

        const report = await applyCatalog(fake.client(), catalog);

        expect(report.aborted).toBe(true);
        expect(report.results).toEqual([
            {
                stage: "groups",
                key: "media",
                outcome: "failed",
                detail: "POST /group returned HTTP 500: middleware exploded",
            },
        ]);
        expect(fake.callsTo("GET", /^\/pool\/dataset/)).toEqual([]);
    });

    it("should record the failure and continue with keepGoing", async () => {
        const fake = new FakeTrueNas();
        fake.failOn("POST", "/group", 500, "middleware exploded");

        const report = await applyCatalog(fake.client(), catalog, { stages: ["groups"], keepGoing: true });

        expect(report.aborted).toBe(false);
        expect(summarizeResults(report.results).get("groups")).toEqual({
            created: 10,
            updated: 0,
            unchanged: 0,
            skipped: 0,
            failed: 1,
        });
    });

    it("should treat HTTP 409 as unchanged", async () => {
        const fake = new FakeTrueNas();
        fake.failOn("POST", "/group", 409, "conflict");

        const report = await applyCatalog(fake.client(), catalog, { stages: ["groups"] });

        expect(report.results[0]).toEqual({
            stage: "groups",
            key: "media",
            outcome: "unchanged",
            detail: "already exists",
        });
        expect(report.results).toHaveLength(11);
    });

    it("should converge dataset properties that drifted", async () => {
        const fake = new FakeTrueNas();
        fake.addDataset("tank/apps", { recordsize: "1M" });

        const report = await applyCatalog(fake.client(), catalog, { stages: ["datasets"] });

        expect(report.results[0]).toEqual({
            stage: "datasets",
            key: "tank/apps",
            outcome: "updated",
            detail: "recordsize 1M -> 128K",
        });
        expect(fake.callsTo("PUT", "/pool/dataset/id/tank%2Fapps")[0].body).toEqual({
            recordsize: "128K",
            compression: "LZ4",
            atime: "OFF",
        });
    });

    it("should add missing supplementary groups to existing users", async () => {
        const fake = new FakeTrueNas();
        await applyCatalog(fake.client(), catalog, { stages: ["groups", "datasets", "users"] });
        const radarr = fake.users.find((u) => u.username === "radarr");
        const download = fake.groups.find((g) => g.group === "download");
        if (radarr) radarr.groups = [];

        const report = await applyCatalog(fake.client(), catalog, { stages: ["users"] });

        expect(report.results.find((r) => r.key === "radarr")).toEqual({
            stage: "users",
            key: "radarr",
            outcome: "updated",
            detail: "add to download",
        });
        expect(fake.callsTo("PUT", `/user/id/${radarr?.id}`)[0].body).toEqual({ groups: [download?.id] });
    });

    it("should fail a user whose group is missing", async () => {
        const fake = new FakeTrueNas();

        const report = await applyCatalog(fake.client(), catalog, { stages: ["users"] });

        expect(report.aborted).toBe(true);
        expect(report.results[0]).toEqual({
            stage: "users",
            key: "plex",
            outcome: "failed",
            detail: "group 'media' does not exist on the NAS",
        });
    });

    it("should keep going through permission failures", async () => {
        const fake = new FakeTrueNas();

        const report = await applyCatalog(fake.client(), catalog, { stages: ["permissions"] });

        expect(report.aborted).toBe(false);
        expect(report.results).toHaveLength(125);
        expect(report.results[0]).toEqual({
            stage: "permissions",
            key: "apps/plex",
            outcome: "failed",
            detail: "path not found: /mnt/tank/apps/plex",
        });
    });

    it("should set ownership with numeric ids through setperm", async () => {
        const fake = new FakeTrueNas();
        fake.addDataset("tank/logs");

        const report = await applyCatalog(fake.client(), catalog, { stages: ["permissions"] });

        expect(report.results.find((r) => r.key === "logs")).toEqual({
            stage: "permissions",
            key: "logs",
            outcome: "updated",
            detail: "0:0 755 -> root:monitor 755",
        });
        expect(fake.callsTo("POST", "/filesystem/setperm")[0].body).toEqual({
            path: "/mnt/tank/logs",
            mode: "755",
            uid: 0,
            gid: 2002,
            options: { recursive: false },
        });
    });

    it("should replace snapshot tasks whose settings differ", async () => {
        const fake = new FakeTrueNas();
        fake.snapshotTasks.push({
            id: 500,
            dataset: "tank/databases",
            recursive: true,
            exclude: [],
            lifetime_value: 48,
            lifetime_unit: "HOUR",
            naming_schema: "critical-%Y%m%d-%H%M",
            schedule: { minute: "*/15", hour: "*", dom: "*", month: "*", dow: "*" },
            allow_empty: false,
            enabled: true,
        });

        const report = await applyCatalog(fake.client(), catalog, { stages: ["snapshots"] });

        expect(report.results[0]).toEqual({
            stage: "snapshots",
            key: "critical-%Y%m%d-%H%M",
            outcome: "updated",
            detail: "lifetime 48 HOUR -> 24 HOUR",
        });
        expect(fake.callsTo("DELETE", "/pool/snapshottask/id/500")).toHaveLength(1);
        expect(fake.snapshotTasks.filter((t) => t.dataset === "tank/databases")).toHaveLength(1);
    });

    it("should drop excludes from non-recursive snapshot tasks", async () => {
        const fake = new FakeTrueNas();
        await applyCatalog(fake.client(), catalog, { stages: ["snapshots"] });

        const apps = fake.snapshotTasks.find((t) => t.naming_schema === "apps-%Y%m%d-%H%M");
        expect(apps?.recursive).toBe(false);
        expect(apps?.exclude).toEqual([]);
    });

    it("should update tunables whose value differs", async () => {
        const fake = new FakeTrueNas();
        const swappiness = fake.addTunable("vm.swappiness", "10");

        const report = await applyCatalog(fake.client(), catalog, { stages: ["tunables"] });

        expect(report.results[0]).toEqual({
            stage: "tunables",
            key: "vm.swappiness",
            outcome: "updated",
            detail: "10 -> 1",
        });
        expect(fake.callsTo("PUT", `/tunable/id/${swappiness.id}`)[0].body).toEqual({
            value: "1",
            enabled: true,
        });
    });

    it("should report each row through onResult", async () => {
        const fake = new FakeTrueNas();
        const seen: string[] = [];

        await applyCatalog(fake.client(), catalog, {
            stages: ["groups"],
            onResult: (result) => seen.push(`${result.key}:${result.outcome}`),
        });

        expect(seen.slice(0, 2)).toEqual(["media:created", "download:created"]);
        expect(seen).toHaveLength(11);
    });
});
