import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Dirent } from 'node:fs';
import { FileAccessError, type FileOperation } from '../runpack/errors.js';

const VERBS: Record<FileOperation, string> = {
    read: 'reading',
    write: 'writing',
    list: 'listing',
};

function errorDetail(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function wrap(operation: FileOperation, target: string, err: unknown): FileAccessError {
    const verb = VERBS[operation];
    return new FileAccessError(`Error ${verb} ${target}: ${errorDetail(err)}`, target, operation, { cause: err });
}

/**
 * The codec's only contact with storage. Failures surface as FileAccessError
 * with the underlying Node error kept as `cause`.
 */
export class FileAccess {
    static async readBytes(target: string): Promise<Uint8Array> {
        try {
            return new Uint8Array(await fs.readFile(target));
        } catch (err) {
            throw wrap('read', target, err);
        }
    }

    static async writeBytes(target: string, data: Uint8Array | string): Promise<void> {
        try {
            await fs.writeFile(target, data);
        } catch (err) {
            throw wrap('write', target, err);
        }
    }

    /** Regular files directly inside `dir`, sorted by name. */
    static async listFiles(dir: string): Promise<string[]> {
        let entries: Dirent[];
        try {
            entries = await fs.readdir(dir, { withFileTypes: true });
        } catch (err) {
            throw wrap('list', dir, err);
        }
        return entries
            .filter((entry) => entry.isFile())
            .map((entry) => path.join(dir, entry.name))
            .sort((a, b) => a.localeCompare(b));
    }
}
