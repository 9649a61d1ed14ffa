import zstdCodec, { type ZstdModule } from 'zstd-codec';

/**
 * A general-purpose compressor run on the same input, so reports can show
 * how the run-length ratio compares. Display only; the codec never uses it.
 */
export interface BaselineCompressor {
    name: string;
    compress(data: Uint8Array): Promise<Uint8Array>;
    decompress(data: Uint8Array): Promise<Uint8Array>;
}

const ZSTD_LEVEL = 3;

let zstdInstance: ZstdModule | null = null;

async function getZstd(): Promise<ZstdModule> {
    if (zstdInstance) return zstdInstance;
    return new Promise((resolve) => {
        zstdCodec.ZstdCodec.run((zstd: ZstdModule) => {
            zstdInstance = zstd;
            resolve(zstd);
        });
    });
}

export const ZstdBaseline: BaselineCompressor = {
    name: 'zstd',
    async compress(data: Uint8Array) {
        const zstd = await getZstd();
        const simple = new zstd.Simple();
        const compressed = simple.compress(data, ZSTD_LEVEL);
        if (!compressed) throw new Error('Zstd compression failed');
        return compressed;
    },
    async decompress(data: Uint8Array) {
        const zstd = await getZstd();
        const simple = new zstd.Simple();
        const decompressed = simple.decompress(data);
        if (!decompressed) throw new Error('Zstd decompression failed');
        return decompressed;
    },
};
