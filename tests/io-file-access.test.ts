import * as fs from 'fs';
import * as path from 'path';
import { FileAccess } from '../src/io/file-access.js';
import { FileAccessError } from '../src/runpack/errors.js';
import { makeSandboxDir } from './helpers/test-utils.js';

describe('FileAccess', () => {
    it('writes and reads bytes', async () => {
        const dir = makeSandboxDir('io');
        const target = path.join(dir, 'data.bin');
        await FileAccess.writeBytes(target, new Uint8Array([0, 254, 255]));
        expect(Array.from(await FileAccess.readBytes(target))).toEqual([0, 254, 255]);
    });

    it('wraps read failures with path, operation and cause', async () => {
        const dir = makeSandboxDir('io');
        const target = path.join(dir, 'missing.bin');
        const err = await FileAccess.readBytes(target).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(FileAccessError);
        expect(err).toMatchObject({ name: 'FileAccessError', path: target, operation: 'read' });
        expect(err).toHaveProperty('cause.code', 'ENOENT');
        expect(err).toHaveProperty('message', expect.stringMatching(/^Error reading /));
    });

    it('wraps write failures', async () => {
        const dir = makeSandboxDir('io');
        const target = path.join(dir, 'no-such-dir', 'out.bin');
        await expect(FileAccess.writeBytes(target, 'x')).rejects.toMatchObject({ operation: 'write', path: target });
    });

    it('lists regular files sorted by name', async () => {
        const dir = makeSandboxDir('io');
        fs.writeFileSync(path.join(dir, 'b.bin'), 'b');
        fs.writeFileSync(path.join(dir, 'a.bin'), 'a');
        fs.mkdirSync(path.join(dir, 'nested'));

        expect(await FileAccess.listFiles(dir)).toEqual([path.join(dir, 'a.bin'), path.join(dir, 'b.bin')]);
    });

    it('wraps listing failures', async () => {
        const dir = path.join(makeSandboxDir('io'), 'absent');
        await expect(FileAccess.listFiles(dir)).rejects.toMatchObject({ name: 'FileAccessError', operation: 'list' });
    });
});
