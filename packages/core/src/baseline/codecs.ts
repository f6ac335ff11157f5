import * as zlib from 'zlib';

export type CodecName = 'gzip' | 'brotli' | 'json';

export interface BaselineCodec {
    name: CodecName;
    /** Artifact suffix appended to the baseline key. */
    extension: string;
    encode(text: string): Buffer;
    decode(data: Buffer): string;
}

const gzipCodec: BaselineCodec = {
    name: 'gzip',
    extension: '.baseline.json.gz',
    encode: (text) => zlib.gzipSync(Buffer.from(text, 'utf8'), { level: 6 }),
    decode: (data) => zlib.gunzipSync(data).toString('utf8'),
};

const brotliCodec: BaselineCodec = {
    name: 'brotli',
    extension: '.baseline.json.br',
    encode: (text) => zlib.brotliCompressSync(Buffer.from(text, 'utf8'), {
        params: {
            [zlib.constants.BROTLI_PARAM_QUALITY]: 11,
            [zlib.constants.BROTLI_PARAM_MODE]: zlib.constants.BROTLI_MODE_TEXT,
        },
    }),
    decode: (data) => zlib.brotliDecompressSync(data).toString('utf8'),
};

const jsonCodec: BaselineCodec = {
    name: 'json',
    extension: '.baseline.json',
    encode: (text) => Buffer.from(text, 'utf8'),
    decode: (data) => data.toString('utf8'),
};

/** Lookup order used when loading; the first artifact found wins. */
export const CODEC_PRIORITY: readonly BaselineCodec[] = [gzipCodec, brotliCodec, jsonCodec];

export const CODEC_NAMES: readonly CodecName[] = CODEC_PRIORITY.map((codec) => codec.name);

export function getCodec(name: CodecName): BaselineCodec {
    const codec = CODEC_PRIORITY.find((candidate) => candidate.name === name);
    if (!codec) {
        throw new Error(`Unknown baseline codec: ${name}`);
    }
    return codec;
}

export function isCodecName(value: string): value is CodecName {
    return CODEC_NAMES.some((name) => name === value);
}

export function parseArtifactName(fileName: string): { key: string; codec: BaselineCodec } | null {
    for (const codec of CODEC_PRIORITY) {
        if (fileName.endsWith(codec.extension) && fileName.length > codec.extension.length) {
            return { key: fileName.slice(0, -codec.extension.length), codec };
        }
    }
    return null;
}
