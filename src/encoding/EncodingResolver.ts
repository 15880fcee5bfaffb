import * as chardet from "chardet";
import { IFileSystem } from "../platform/FileSystem.js";
import { DEFAULT_ENCODING, isSupportedEncoding, normalizeEncodingName } from "./TextCodec.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { describeError } from "../errors/LargeFileErrors.js";

export interface EncodingSuggestion {
    encoding: string;
    /** In [0, 1]. */
    confidence: number;
}

export interface EncodingDetector {
    detect(sample: Buffer): EncodingSuggestion | undefined;
}

export const ENCODING_SAMPLE_BYTES = 64 * 1024;
export const MIN_ENCODING_CONFIDENCE = 0.7;

function isValidUtf8Prefix(sample: Buffer): boolean {
    try {
        // stream mode tolerates a multi-byte sequence cut at the sample boundary
        new TextDecoder("utf-8", { fatal: true }).decode(sample, { stream: true });
        return true;
    } catch {
        return false;
    }
}

/**
 * Valid UTF-8 wins outright; anything else is left to chardet's statistical guess.
 */
export class ChardetEncodingDetector implements EncodingDetector {
    detect(sample: Buffer): EncodingSuggestion | undefined {
        if (isValidUtf8Prefix(sample)) {
            return { encoding: DEFAULT_ENCODING, confidence: 1 };
        }
        const [best] = chardet.analyse(sample);
        if (!best) {
            return undefined;
        }
        return { encoding: best.name, confidence: best.confidence / 100 };
    }
}

const logger = createLogger("EncodingResolver");

export class EncodingResolver {
    constructor(
        private readonly fileSystem: IFileSystem,
        private readonly detector?: EncodingDetector,
        private readonly fallbackEncoding: string = DEFAULT_ENCODING
    ) {}

    /** Never throws; every failure means "no suggestion". */
    public async resolve(filePath: string): Promise<string> {
        if (!this.detector) {
            return this.fallbackEncoding;
        }
        try {
            const sample = await this.fileSystem.readHead(filePath, ENCODING_SAMPLE_BYTES);
            return this.fromSample(sample);
        } catch (error) {
            logger.debug("Encoding sample unavailable, using fallback", { filePath, error: describeError(error) });
            return this.fallbackEncoding;
        }
    }

    public fromSample(sample: Buffer): string {
        if (!this.detector || sample.length === 0) {
            return this.fallbackEncoding;
        }
        let suggestion: EncodingSuggestion | undefined;
        try {
            suggestion = this.detector.detect(sample);
        } catch (error) {
            logger.debug("Encoding detector failed", { error: describeError(error) });
            return this.fallbackEncoding;
        }
        if (!suggestion || suggestion.confidence < MIN_ENCODING_CONFIDENCE) {
            return this.fallbackEncoding;
        }
        const name = normalizeEncodingName(suggestion.encoding);
        if (name === "ascii" || name === "us-ascii") {
            return DEFAULT_ENCODING;
        }
        return isSupportedEncoding(name) ? name : this.fallbackEncoding;
    }
}
