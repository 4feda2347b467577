import type { BuiltinCommand, BuiltinDeps, BuiltinHandler } from './types.js';
import { command as pwd } from './pwd.js';
import { command as cd } from './cd.js';
import { command as ls } from './ls.js';
import { command as mkdir } from './mkdir.js';
import { command as rmdir } from './rmdir.js';
import { command as rm } from './rm.js';
import { command as touch } from './touch.js';
import { command as mv } from './mv.js';
import { command as cp } from './cp.js';
import { command as echo } from './echo.js';
import { command as cat } from './cat.js';
import { headCommand, tailCommand } from './head.js';
import { command as wc } from './wc.js';
import { command as grep } from './grep.js';
import { command as find } from './find.js';
import { command as tree } from './tree.js';
import { command as du } from './du.js';
import { command as stat } from './stat.js';
import { command as chmod } from './chmod.js';
import { command as date } from './date.js';
import { whoamiCommand, hostnameCommand } from './identity.js';
import { cpuCommand, memCommand, psCommand, dfCommand, uptimeCommand } from './system.js';
import { md5sumCommand, sha256sumCommand } from './checksum.js';
import { command as clear } from './clear.js';
import { command as which } from './which.js';
import { command as help } from './help.js';

const COMMANDS: readonly BuiltinCommand[] = [
    pwd,
    cd,
    ls,
    mkdir,
    rmdir,
    rm,
    touch,
    mv,
    cp,
    echo,
    cat,
    headCommand,
    tailCommand,
    wc,
    grep,
    find,
    tree,
    du,
    dfCommand,
    stat,
    chmod,
    date,
    uptimeCommand,
    whoamiCommand,
    hostnameCommand,
    md5sumCommand,
    sha256sumCommand,
    clear,
    which,
    help,
    cpuCommand,
    memCommand,
    psCommand
];

/**
 * Names of every registered verb, aliases excluded.
 */
export function commandNames_list(): string[] {
    return COMMANDS.map((command: BuiltinCommand): string => command.name);
}

/**
 * Build builtin command handler registry for dispatch.
 *
 * @param deps - Shared dependencies injected into each builtin factory.
 * @returns Verb-keyed handler registry, aliases included.
 */
export function registry_create(deps: BuiltinDeps): Map<string, BuiltinHandler> {
    const registry: Map<string, BuiltinHandler> = new Map<string, BuiltinHandler>();
    for (const command of COMMANDS) {
        const handler: BuiltinHandler = command.create(deps);
        registry.set(command.name, handler);
        for (const alias of command.aliases ?? []) {
            registry.set(alias, handler);
        }
    }
    return registry;
}
