/**
 * @file Runtime Settings
 *
 * Resolves front-end configuration with deterministic precedence:
 * explicit option > environment > YAML config file > defaults.
 *
 * Environment keys: `TERMLET_HOST`, `TERMLET_PORT`, `TERMLET_CWD`,
 * `TERMLET_CONFIG`. A `.env` file in the base directory hydrates missing
 * environment keys before resolution.
 *
 * @module
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';

export type SettingSource = 'option' | 'env' | 'file' | 'default';

export interface TermletSettings {
    host: string;
    port: number;
    initialCwd: string;
    wsPath: string;
    maxSessions: number;
}

export interface SettingsOptions {
    host?: string;
    port?: number;
    initialCwd?: string;
    configPath?: string;
    /** Environment to read (and hydrate from `.env`). Defaults to `process.env`. */
    env?: NodeJS.ProcessEnv;
    /** Directory searched for `.env` and the default config file. */
    baseDir?: string;
}

export interface ResolvedSettings {
    settings: TermletSettings;
    sources: Record<keyof TermletSettings, SettingSource>;
    warnings: string[];
}

const DEFAULT_CONFIG_FILE: string = 'termlet.yaml';

const DEFAULTS: Omit<TermletSettings, 'initialCwd'> = {
    host: 'localhost',
    port: 5001,
    wsPath: '/api/ws',
    maxSessions: 64
};

export const ConfigFileSchema = z.object({
    host: z.string().min(1).optional(),
    port: z.number().int().optional(),
    initialCwd: z.string().min(1).optional(),
    wsPath: z.string().startsWith('/').optional(),
    maxSessions: z.number().int().positive().optional()
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ─── Environment Loading ────────────────────────────────────────────────────

/**
 * Hydrate missing keys of `env` from a `.env` file in `baseDir`.
 *
 * Lines are `KEY=VALUE`; blank lines and `#` comments are skipped and
 * surrounding quotes are stripped. Keys already set are left alone.
 *
 * @returns True if a `.env` file was read.
 */
export function env_load(baseDir: string, env: NodeJS.ProcessEnv): boolean {
    const envPath: string = path.join(baseDir, '.env');
    if (!fs.existsSync(envPath)) {
        return false;
    }

    const content: string = fs.readFileSync(envPath, 'utf-8');
    for (const line of content.split(/\r?\n/)) {
        const trimmed: string = line.trim();
        if (!trimmed || trimmed.startsWith('#') || !trimmed.includes('=')) {
            continue;
        }
        const separator: number = trimmed.indexOf('=');
        const key: string = trimmed.slice(0, separator).trim();
        const value: string = trimmed.slice(separator + 1).trim().replace(/^["']|["']$/g, '');
        if (key && !env[key]) {
            env[key] = value;
        }
    }
    return true;
}

// ─── Config File ────────────────────────────────────────────────────────────

export type ConfigFileLoadResult =
    | { ok: true; config: ConfigFile }
    | { ok: false; error: string };

/**
 * Read and validate a YAML config file.
 *
 * A missing file is not an error and yields an empty config.
 */
export function configFile_load(filePath: string): ConfigFileLoadResult {
    if (!fs.existsSync(filePath)) {
        return { ok: true, config: {} };
    }

    let raw: unknown;
    try {
        raw = yaml.load(fs.readFileSync(filePath, 'utf-8'));
    } catch (error: unknown) {
        const message: string = error instanceof Error ? error.message : String(error);
        return { ok: false, error: `Invalid YAML in ${filePath}: ${message}` };
    }

    if (raw === undefined || raw === null) {
        return { ok: true, config: {} };
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issues: string = parsed.error.issues
            .map((issue: z.ZodIssue): string => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join(', ');
        return { ok: false, error: `Invalid config ${filePath}: ${issues}` };
    }
    return { ok: true, config: parsed.data };
}

// ─── Port ───────────────────────────────────────────────────────────────────

/**
 * Validate TCP port range.
 */
export function port_isValid(port: number): boolean {
    return Number.isInteger(port) && port > 0 && port <= 65535;
}

// ─── Resolution ─────────────────────────────────────────────────────────────

/**
 * Resolve runtime settings.
 *
 * Invalid values at any level are reported in `warnings` and the next
 * level down is used instead.
 *
 * @param options - Explicit overrides and lookup context.
 * @returns Effective settings, where each value came from, and warnings.
 */
export function settings_resolve(options: SettingsOptions = {}): ResolvedSettings {
    const env: NodeJS.ProcessEnv = options.env ?? process.env;
    const baseDir: string = options.baseDir ?? process.cwd();
    const warnings: string[] = [];

    env_load(baseDir, env);

    const configPath: string = options.configPath ?? env.TERMLET_CONFIG ?? path.join(baseDir, DEFAULT_CONFIG_FILE);
    const loaded: ConfigFileLoadResult = configFile_load(path.resolve(baseDir, configPath));
    let file: ConfigFile = {};
    if (loaded.ok) {
        file = loaded.config;
    } else {
        warnings.push(`${loaded.error}. Ignoring config file.`);
    }

    const sources: Record<keyof TermletSettings, SettingSource> = {
        host: 'default',
        port: 'default',
        initialCwd: 'default',
        wsPath: 'default',
        maxSessions: 'default'
    };

    let host: string = DEFAULTS.host;
    if (options.host) {
        host = options.host;
        sources.host = 'option';
    } else if (env.TERMLET_HOST) {
        host = env.TERMLET_HOST;
        sources.host = 'env';
    } else if (file.host) {
        host = file.host;
        sources.host = 'file';
    }

    let port: number = DEFAULTS.port;
    const portCandidates: Array<[SettingSource, string, number | undefined]> = [
        ['option', 'port option', options.port],
        ['env', 'TERMLET_PORT value', env.TERMLET_PORT !== undefined ? Number(env.TERMLET_PORT) : undefined],
        ['file', 'config port', file.port]
    ];
    for (const [source, label, candidate] of portCandidates) {
        if (candidate === undefined) {
            continue;
        }
        if (port_isValid(candidate)) {
            port = candidate;
            sources.port = source;
            break;
        }
        const raw: string = source === 'env' ? String(env.TERMLET_PORT) : String(candidate);
        warnings.push(`Invalid ${label} "${raw}". Falling back.`);
    }

    let initialCwd: string = os.tmpdir();
    if (options.initialCwd) {
        initialCwd = path.resolve(baseDir, options.initialCwd);
        sources.initialCwd = 'option';
    } else if (env.TERMLET_CWD) {
        initialCwd = path.resolve(baseDir, env.TERMLET_CWD);
        sources.initialCwd = 'env';
    } else if (file.initialCwd) {
        initialCwd = path.resolve(baseDir, file.initialCwd);
        sources.initialCwd = 'file';
    }

    let wsPath: string = DEFAULTS.wsPath;
    if (file.wsPath) {
        wsPath = file.wsPath;
        sources.wsPath = 'file';
    }

    let maxSessions: number = DEFAULTS.maxSessions;
    if (file.maxSessions !== undefined) {
        maxSessions = file.maxSessions;
        sources.maxSessions = 'file';
    }

    return {
        settings: { host, port, initialCwd, wsPath, maxSessions },
        sources,
        warnings
    };
}

/**
 * Make sure the initial working directory exists.
 */
export function workingDirectory_prepare(directory: string): void {
    fs.mkdirSync(directory, { recursive: true });
}
