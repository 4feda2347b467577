/**
 * @file Test Fixtures
 *
 * Fake host metrics and scratch directories for the unit tests.
 *
 * @module
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { DiskUsage, MemoryStats, ProcessInfo, SystemMetricsProvider } from '../system/metrics.js';
import { Interpreter } from '../shell/Interpreter.js';

/** Fixed clock reading shared by the command tests (local time). */
export const FIXED_NOW: Date = new Date(2024, 2, 5, 7, 8, 9);

export class FakeMetricsProvider implements SystemMetricsProvider {
    public cpu: number = 12.5;
    public memory: MemoryStats = { total: 8000, used: 2000, percent: 25 };
    public processes: ProcessInfo[] = [];
    public disk: DiskUsage = { total: 1000000, used: 250000, free: 750000, percent: 25 };
    public boot: Date = new Date(FIXED_NOW.getTime() - 3600 * 1000);
    public diskPaths: string[] = [];

    public cpu_percent(): number {
        return this.cpu;
    }

    public memory_get(): MemoryStats {
        return this.memory;
    }

    public processes_list(): ProcessInfo[] {
        return this.processes;
    }

    public disk_usage(mountPath: string): DiskUsage {
        this.diskPaths.push(mountPath);
        return this.disk;
    }

    public bootTime_get(): Date {
        return this.boot;
    }
}

/**
 * Create an empty scratch directory under the OS temp dir.
 */
export function workspace_create(): string {
    return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'termlet-')));
}

export function workspace_remove(directory: string): void {
    fs.rmSync(directory, { recursive: true, force: true });
}

/**
 * Build an interpreter wired to fakes, with `homeDir` as its home.
 */
export function interpreter_create(homeDir: string, metrics: SystemMetricsProvider = new FakeMetricsProvider()): Interpreter {
    return new Interpreter({
        metrics,
        homeDir,
        identity: { username: 'tester', hostname: 'test-host' },
        clock: (): Date => FIXED_NOW
    });
}
