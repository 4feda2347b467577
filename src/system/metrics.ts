/**
 * @file System Metrics Provider
 *
 * Contract consumed by the `cpu`, `mem`, `ps`, `df` and `uptime` builtins,
 * plus the host implementation built on Node's `os` module, `statfs` and
 * the Linux `/proc` filesystem.
 *
 * @module
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

export interface MemoryStats {
    total: number;
    used: number;
    percent: number;
}

export interface DiskUsage {
    total: number;
    used: number;
    free: number;
    percent: number;
}

export interface ProcessInfo {
    pid: number;
    name: string;
    cpuPercent: number;
    memPercent: number;
}

export interface SystemMetricsProvider {
    /** Busy share of all CPUs, 0-100. */
    cpu_percent(): number;
    memory_get(): MemoryStats;
    processes_list(): ProcessInfo[];
    disk_usage(mountPath: string): DiskUsage;
    bootTime_get(): Date;
}

interface CpuSample {
    idle: number;
    total: number;
}

export interface HostMetricsOptions {
    /** Root of the proc filesystem. */
    procRoot?: string;
    /** Kernel clock ticks per second used by `/proc/<pid>/stat`. */
    clockTicks?: number;
    pageSize?: number;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function percent_round(value: number): number {
    return Math.round(value * 10) / 10;
}

function cpuSample_take(): CpuSample {
    let idle: number = 0;
    let total: number = 0;
    for (const cpu of os.cpus()) {
        const times = cpu.times;
        idle += times.idle;
        total += times.user + times.nice + times.sys + times.idle + times.irq;
    }
    return { idle, total };
}

/**
 * Parse the fields of `/proc/<pid>/stat` needed for `ps`.
 *
 * The command name sits in parentheses and may itself contain spaces or
 * parentheses, so fields are counted from the last `)`.
 *
 * @param content - Raw stat file content.
 * @returns Name, CPU ticks, start ticks and resident pages, or null.
 */
export function procStat_parse(content: string): { name: string; cpuTicks: number; startTicks: number; rssPages: number } | null {
    const open: number = content.indexOf('(');
    const close: number = content.lastIndexOf(')');
    if (open === -1 || close < open) {
        return null;
    }
    const fields: string[] = content.slice(close + 1).trim().split(/\s+/);
    // fields[0] is the process state (field 3 of the stat line)
    if (fields.length < 22) {
        return null;
    }
    const utime: number = Number(fields[11]);
    const stime: number = Number(fields[12]);
    const startTicks: number = Number(fields[19]);
    const rssPages: number = Number(fields[21]);
    if (![utime, stime, startTicks, rssPages].every(Number.isFinite)) {
        return null;
    }
    return { name: content.slice(open + 1, close), cpuTicks: utime + stime, startTicks, rssPages };
}

// ─── Host Provider ──────────────────────────────────────────────────────────

export class HostMetricsProvider implements SystemMetricsProvider {
    private readonly procRoot: string;
    private readonly clockTicks: number;
    private readonly pageSize: number;
    private lastSample: CpuSample = { idle: 0, total: 0 };

    constructor(options: HostMetricsOptions = {}) {
        this.procRoot = options.procRoot ?? '/proc';
        this.clockTicks = options.clockTicks ?? 100;
        this.pageSize = options.pageSize ?? 4096;
    }

    /**
     * CPU busy share since the previous call (since boot on the first).
     */
    public cpu_percent(): number {
        const current: CpuSample = cpuSample_take();
        const totalDelta: number = current.total - this.lastSample.total;
        const idleDelta: number = current.idle - this.lastSample.idle;
        this.lastSample = current;
        if (totalDelta <= 0) {
            return 0;
        }
        return percent_round(((totalDelta - idleDelta) / totalDelta) * 100);
    }

    public memory_get(): MemoryStats {
        const total: number = os.totalmem();
        const used: number = total - os.freemem();
        return { total, used, percent: total > 0 ? percent_round((used / total) * 100) : 0 };
    }

    /**
     * List processes from the proc filesystem.
     *
     * CPU% is the lifetime average (CPU time over wall time since start).
     * Processes that exit while being read are left out. Hosts without a
     * proc filesystem report an empty list.
     */
    public processes_list(): ProcessInfo[] {
        if (!fs.existsSync(this.procRoot)) {
            return [];
        }

        const uptimeSeconds: number = os.uptime();
        const totalMemory: number = os.totalmem();
        const processes: ProcessInfo[] = [];

        for (const entry of fs.readdirSync(this.procRoot)) {
            if (!/^\d+$/.test(entry)) {
                continue;
            }
            const info: ProcessInfo | null = this.process_read(Number(entry), uptimeSeconds, totalMemory);
            if (info !== null) {
                processes.push(info);
            }
        }
        return processes;
    }

    public disk_usage(mountPath: string): DiskUsage {
        const stats: fs.StatsFs = fs.statfsSync(mountPath);
        const total: number = stats.blocks * stats.bsize;
        const free: number = stats.bavail * stats.bsize;
        const used: number = (stats.blocks - stats.bfree) * stats.bsize;
        const available: number = used + free;
        return { total, used, free, percent: available > 0 ? percent_round((used / available) * 100) : 0 };
    }

    public bootTime_get(): Date {
        return new Date(Date.now() - os.uptime() * 1000);
    }

    private process_read(pid: number, uptimeSeconds: number, totalMemory: number): ProcessInfo | null {
        let content: string;
        try {
            content = fs.readFileSync(path.join(this.procRoot, String(pid), 'stat'), 'utf-8');
        } catch {
            return null;
        }

        const parsed = procStat_parse(content);
        if (parsed === null) {
            return null;
        }

        const elapsed: number = uptimeSeconds - parsed.startTicks / this.clockTicks;
        const cpuSeconds: number = parsed.cpuTicks / this.clockTicks;
        const cpuPercent: number = elapsed > 0 ? percent_round((cpuSeconds / elapsed) * 100) : 0;
        const memPercent: number = totalMemory > 0
            ? percent_round(((parsed.rssPages * this.pageSize) / totalMemory) * 100)
            : 0;

        return { pid, name: parsed.name, cpuPercent, memPercent };
    }
}
