/**
 * `md5sum` and `sha256sum` builtin implementations.
 *
 * Files are hashed in 4096-byte chunks; each operand prints
 * `HEXDIGEST  FILE`.
 */

import crypto from 'crypto';
import fs from 'fs';
import type { BuiltinCommand, BuiltinHandler } from './types.js';
import { OperandError } from '../errors.js';
import { path_resolve } from '../path.js';
import { file_require, outcome_ok } from './_shared.js';

const CHUNK_SIZE: number = 4096;

/**
 * Hash one file by streaming it through `algorithm`.
 *
 * @param filePath - Absolute file path.
 * @param algorithm - Node crypto hash name.
 * @returns Lowercase hex digest.
 */
export function fileDigest_compute(filePath: string, algorithm: string): string {
    const hash: crypto.Hash = crypto.createHash(algorithm);
    const buffer: Buffer = Buffer.alloc(CHUNK_SIZE);
    const fd: number = fs.openSync(filePath, 'r');
    try {
        let bytesRead: number = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null);
        while (bytesRead > 0) {
            hash.update(buffer.subarray(0, bytesRead));
            bytesRead = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null);
        }
    } finally {
        fs.closeSync(fd);
    }
    return hash.digest('hex');
}

function checksum_create(verb: string, algorithm: string): BuiltinHandler {
    return (args, cwd) => {
        if (args.length === 0) {
            throw new OperandError(`${verb}: missing file operand`);
        }
        const rows: string[] = [];
        for (const operand of args) {
            const resolved: string = path_resolve(operand, cwd);
            file_require(verb, operand, resolved);
            rows.push(`${fileDigest_compute(resolved, algorithm)}  ${operand}`);
        }
        return outcome_ok(`${rows.join('\n')}\n`, cwd);
    };
}

export const md5sumCommand: BuiltinCommand = {
    name: 'md5sum',
    create: () => checksum_create('md5sum', 'md5')
};

export const sha256sumCommand: BuiltinCommand = {
    name: 'sha256sum',
    create: () => checksum_create('sha256sum', 'sha256')
};
