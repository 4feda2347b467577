/**
 * Builtins reporting global system state: `cpu`, `mem`, `ps`, `df` and
 * `uptime`. None of them touch the working directory, so each returns the
 * "unchanged" marker instead of echoing `cwd`.
 */

import type { BuiltinCommand } from './types.js';
import type { DiskUsage, MemoryStats, ProcessInfo } from '../../system/metrics.js';
import { outcome_global } from './_shared.js';

const PROCESS_LIMIT: number = 200;
const PROCESS_NAME_WIDTH: number = 20;
const DISK_ROOT: string = '/';

export const cpuCommand: BuiltinCommand = {
    name: 'cpu',
    create: ({ metrics }) => () => outcome_global(`CPU: ${metrics.cpu_percent().toFixed(1)}%\n`)
};

export const memCommand: BuiltinCommand = {
    name: 'mem',
    create: ({ metrics }) => () => {
        const memory: MemoryStats = metrics.memory_get();
        return outcome_global(`Memory: ${memory.used}/${memory.total} bytes (${memory.percent.toFixed(1)}%)\n`);
    }
};

export const psCommand: BuiltinCommand = {
    name: 'ps',
    create: ({ metrics }) => () => {
        const rows: string[] = metrics.processes_list()
            .map(processRow_render)
            .sort()
            .slice(0, PROCESS_LIMIT);
        return outcome_global(`${rows.join('\n')}\n`);
    }
};

export const dfCommand: BuiltinCommand = {
    name: 'df',
    create: ({ metrics }) => () => {
        const disk: DiskUsage = metrics.disk_usage(DISK_ROOT);
        const header: string = 'Filesystem     Size      Used     Avail    Use%';
        const sizes: string = [disk.total, disk.used, disk.free]
            .map((value: number): string => String(value).padStart(10))
            .join(' ');
        const percent: string = String(Math.round(disk.percent)).padStart(3);
        return outcome_global(`${header}\nroot      ${sizes}  ${percent}%\n`);
    }
};

export const uptimeCommand: BuiltinCommand = {
    name: 'uptime',
    create: ({ metrics, clock }) => () => {
        const elapsedSeconds: number = Math.max(0, Math.floor((clock().getTime() - metrics.bootTime_get().getTime()) / 1000));
        return outcome_global(`${uptime_format(elapsedSeconds)}\n`);
    }
};

/**
 * Render one `ps` row: PID, name, CPU% and MEM%.
 */
export function processRow_render(info: ProcessInfo): string {
    const pid: string = String(info.pid).padStart(6);
    const name: string = info.name.slice(0, PROCESS_NAME_WIDTH).padEnd(PROCESS_NAME_WIDTH);
    const cpu: string = info.cpuPercent.toFixed(1).padStart(5);
    const mem: string = info.memPercent.toFixed(1).padStart(5);
    return `${pid} ${name} CPU%:${cpu} MEM%:${mem}`;
}

/**
 * Format elapsed seconds as `up D days, H:MM`.
 */
export function uptime_format(elapsedSeconds: number): string {
    const days: number = Math.floor(elapsedSeconds / 86400);
    const remainder: number = elapsedSeconds % 86400;
    const hours: number = Math.floor(remainder / 3600);
    const minutes: number = Math.floor((remainder % 3600) / 60);
    return `up ${days} days, ${hours}:${String(minutes).padStart(2, '0')}`;
}
