/**
 * Type declarations for zstd-codec
 * @see https://www.npmjs.com/package/zstd-codec
 */
declare module 'zstd-codec' {
    export interface ZstdSimple {
        compress(data: Uint8Array, level?: number): Uint8Array | null;
        decompress(data: Uint8Array): Uint8Array | null;
    }

    export interface ZstdModule {
        Simple: new () => ZstdSimple;
    }

    export interface ZstdCodecStatic {
        run(callback: (zstd: ZstdModule) => void): void;
    }

    export const ZstdCodec: ZstdCodecStatic;

    const zstdCodec: { ZstdCodec: ZstdCodecStatic };
    export default zstdCodec;
}
