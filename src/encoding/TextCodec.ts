import * as iconv from "iconv-lite";
import { AccessError, describeError } from "../errors/LargeFileErrors.js";

export const DEFAULT_ENCODING = "utf-8";

/** Incremental decoder; `end` flushes and rejects a truncated trailing sequence. */
export interface ChunkDecoder {
    write(chunk: Buffer): string;
    end(): string;
}

/** Incremental encoder; a surrogate pair split across writes is held until its second half arrives. */
export interface ChunkEncoder {
    write(text: string): Buffer;
    end(): Buffer;
}

export function normalizeEncodingName(encoding: string): string {
    const lowered = encoding.trim().toLowerCase();
    if (lowered === "utf8" || lowered === "utf-8") {
        return DEFAULT_ENCODING;
    }
    return lowered;
}

function isUtf8(encoding: string): boolean {
    return normalizeEncodingName(encoding) === DEFAULT_ENCODING;
}

export function isSupportedEncoding(encoding: string): boolean {
    return isUtf8(encoding) || iconv.encodingExists(normalizeEncodingName(encoding));
}

function assertSupported(encoding: string, filePath: string): void {
    if (!isSupportedEncoding(encoding)) {
        throw new AccessError("decode-failed", filePath, `Cannot decode ${filePath}: unsupported encoding ${encoding}`);
    }
}

function decodeFailure(filePath: string, encoding: string, error: unknown): AccessError {
    return new AccessError(
        "decode-failed",
        filePath,
        `Cannot decode ${filePath} with encoding ${encoding}: ${describeError(error)}`,
        error
    );
}

/**
 * UTF-8 goes through a fatal TextDecoder so malformed input is an error rather
 * than replacement characters. A leading BOM is kept so writes reproduce it.
 */
export function decode(data: Buffer, encoding: string, filePath: string): string {
    assertSupported(encoding, filePath);
    try {
        if (isUtf8(encoding)) {
            return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(data);
        }
        return iconv.decode(data, normalizeEncodingName(encoding), { stripBOM: false });
    } catch (error) {
        throw decodeFailure(filePath, encoding, error);
    }
}

export function createDecoder(encoding: string, filePath: string): ChunkDecoder {
    assertSupported(encoding, filePath);
    if (isUtf8(encoding)) {
        const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
        return {
            write: (chunk) => {
                try {
                    return decoder.decode(chunk, { stream: true });
                } catch (error) {
                    throw decodeFailure(filePath, encoding, error);
                }
            },
            end: () => {
                try {
                    return decoder.decode();
                } catch (error) {
                    throw decodeFailure(filePath, encoding, error);
                }
            }
        };
    }

    const decoder = iconv.getDecoder(normalizeEncodingName(encoding), { stripBOM: false });
    return {
        write: (chunk) => decoder.write(chunk),
        end: () => decoder.end() ?? ""
    };
}

function assertEncodable(encoding: string, filePath: string): void {
    if (!isSupportedEncoding(encoding)) {
        throw new AccessError("write-failed", filePath, `Cannot encode ${filePath}: unsupported encoding ${encoding}`);
    }
}

export function encode(content: string, encoding: string, filePath: string): Buffer {
    assertEncodable(encoding, filePath);
    if (isUtf8(encoding)) {
        return Buffer.from(content, "utf8");
    }
    return iconv.encode(content, normalizeEncodingName(encoding));
}

function isHighSurrogate(code: number): boolean {
    return code >= 0xd800 && code <= 0xdbff;
}

export function createEncoder(encoding: string, filePath: string): ChunkEncoder {
    assertEncodable(encoding, filePath);
    const sink: ChunkEncoder = isUtf8(encoding)
        ? { write: (text) => Buffer.from(text, "utf8"), end: () => Buffer.alloc(0) }
        : (() => {
            const encoder = iconv.getEncoder(normalizeEncodingName(encoding));
            return { write: (text: string) => encoder.write(text), end: () => encoder.end() ?? Buffer.alloc(0) };
        })();

    let held = "";
    return {
        write: (text) => {
            let pending = held + text;
            held = "";
            if (pending.length > 0 && isHighSurrogate(pending.charCodeAt(pending.length - 1))) {
                held = pending.slice(-1);
                pending = pending.slice(0, -1);
            }
            return sink.write(pending);
        },
        end: () => {
            const tail = held.length > 0 ? sink.write(held) : Buffer.alloc(0);
            held = "";
            return Buffer.concat([tail, sink.end()]);
        }
    };
}
