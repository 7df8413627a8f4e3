/**
 * Records returned and accepted by the TrueNAS SCALE middleware REST API
 * (v2.0). Only the fields tankctl reads or writes are listed.
 */

/**
 * ZFS property as the middleware reports it
 */
export interface ZfsProperty {
    value: string;
    rawvalue?: string;
    source?: string;
}

export interface TrueNasGroup {
    /** Internal row id, used when a user references the group */
    id: number;
    gid: number;
    group: string;
    builtin?: boolean;
    smb?: boolean;
}

export interface CreateGroupPayload {
    name: string;
    gid: number;
    smb: boolean;
}

export interface TrueNasUser {
    id: number;
    uid: number;
    username: string;
    full_name: string;
    home: string;
    shell: string;
    builtin?: boolean;
    group: {
        id: number;
        bsdgrp_gid: number;
        bsdgrp_group: string;
    };
    /** Internal ids of supplementary groups */
    groups: number[];
}

export interface CreateUserPayload {
    username: string;
    uid: number;
    /** Internal id of the primary group */
    group: number;
    group_create: boolean;
    groups: number[];
    home: string;
    home_create: boolean;
    full_name: string;
    shell: string;
    password_disabled: boolean;
    smb: boolean;
    sudo_commands?: string[];
    sudo_commands_nopasswd?: string[];
    sshpubkey?: string;
}

export type UpdateUserPayload = Partial<Omit<CreateUserPayload, "username" | "group_create">>;

export interface TrueNasDataset {
    /** Full dataset name, e.g. "tank/apps/grafana" */
    id: string;
    name: string;
    type: string;
    mountpoint?: string;
    recordsize: ZfsProperty;
    compression: ZfsProperty;
    atime: ZfsProperty;
    xattr?: ZfsProperty;
    /** Space properties; rawvalue is a byte count */
    used?: ZfsProperty;
    usedbysnapshots?: ZfsProperty;
    available?: ZfsProperty;
}

export interface CreateDatasetPayload {
    name: string;
    type: "FILESYSTEM";
    recordsize: string;
    compression: string;
    atime: string;
    xattr: string;
}

export type UpdateDatasetPayload = Partial<Omit<CreateDatasetPayload, "name" | "type">>;

export interface SnapshotSchedule {
    minute: string;
    hour: string;
    dom: string;
    month: string;
    dow: string;
    begin?: string;
    end?: string;
}

export interface SnapshotTaskPayload {
    dataset: string;
    recursive: boolean;
    exclude: string[];
    lifetime_value: number;
    lifetime_unit: string;
    naming_schema: string;
    schedule: SnapshotSchedule;
    allow_empty: boolean;
    enabled: boolean;
}

export interface TrueNasSnapshotTask extends SnapshotTaskPayload {
    id: number;
}

export interface TrueNasSnapshot {
    /** "pool/dataset@name" */
    id: string;
    name: string;
    dataset: string;
    snapshot_name: string;
    properties?: {
        used?: ZfsProperty;
        referenced?: ZfsProperty;
    };
}

export interface CreateSnapshotPayload {
    dataset: string;
    name: string;
    recursive: boolean;
}

export interface TrueNasTunable {
    id: number;
    var: string;
    value: string;
    type: string;
    comment: string;
    enabled: boolean;
}

export interface CreateTunablePayload {
    var: string;
    value: string;
    type: string;
    comment: string;
    enabled: boolean;
}

export type UpdateTunablePayload = Partial<Omit<CreateTunablePayload, "var" | "type">>;

export interface SetPermissionsPayload {
    path: string;
    mode: string;
    uid: number;
    gid: number;
    options: {
        recursive: boolean;
        stripacl?: boolean;
    };
}

export interface FileStat {
    /** st_mode, including the file type bits */
    mode: number;
    uid: number;
    gid: number;
}

export type JobState = "WAITING" | "RUNNING" | "SUCCESS" | "FAILED" | "ABORTED";

export interface TrueNasJob {
    id: number;
    method: string;
    state: JobState;
    result?: unknown;
    error?: string | null;
}

export interface SystemInfo {
    version: string;
    hostname: string;
    uptime_seconds?: number;
}
