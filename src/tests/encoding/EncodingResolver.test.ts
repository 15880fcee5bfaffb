import { describe, it, expect } from "@jest/globals";
import {
    ChardetEncodingDetector,
    EncodingDetector,
    EncodingResolver,
    EncodingSuggestion,
    ENCODING_SAMPLE_BYTES
} from "../../encoding/EncodingResolver.js";
import { MemoryFileSystem } from "../../platform/FileSystem.js";

class FixedDetector implements EncodingDetector {
    readonly samples: number[] = [];

    constructor(private readonly suggestion: EncodingSuggestion | undefined) {}

    detect(sample: Buffer): EncodingSuggestion | undefined {
        this.samples.push(sample.length);
        return this.suggestion;
    }
}

class ThrowingDetector implements EncodingDetector {
    detect(): EncodingSuggestion | undefined {
        throw new Error("detector crashed");
    }
}

const sample = Buffer.from("some text");

describe("EncodingResolver.fromSample", () => {
    const fileSystem = new MemoryFileSystem("/work");
    const resolverFor = (detector: EncodingDetector | undefined, fallback?: string) =>
        new EncodingResolver(fileSystem, detector, fallback);

    it("accepts suggestions at the confidence threshold", () => {
        expect(resolverFor(new FixedDetector({ encoding: "Shift_JIS", confidence: 0.7 })).fromSample(sample)).toBe("shift_jis");
        expect(resolverFor(new FixedDetector({ encoding: "Shift_JIS", confidence: 0.69 })).fromSample(sample)).toBe("utf-8");
    });

    it("reads ASCII as UTF-8", () => {
        expect(resolverFor(new FixedDetector({ encoding: "ASCII", confidence: 1 })).fromSample(sample)).toBe("utf-8");
    });

    it("falls back when the detector has nothing usable", () => {
        expect(resolverFor(new FixedDetector(undefined)).fromSample(sample)).toBe("utf-8");
        expect(resolverFor(new FixedDetector({ encoding: "x-made-up", confidence: 0.99 })).fromSample(sample)).toBe("utf-8");
        expect(resolverFor(new ThrowingDetector()).fromSample(sample)).toBe("utf-8");
        expect(resolverFor(undefined).fromSample(sample)).toBe("utf-8");
    });

    it("uses the configured fallback for an empty sample", () => {
        const detector = new FixedDetector({ encoding: "utf-8", confidence: 1 });
        expect(resolverFor(detector, "latin1").fromSample(Buffer.alloc(0))).toBe("latin1");
        expect(detector.samples).toEqual([]);
    });
});

describe("EncodingResolver.resolve", () => {
    it("samples the head of the file", async () => {
        const fileSystem = new MemoryFileSystem("/work");
        await fileSystem.writeFile("/work/big.txt", Buffer.alloc(ENCODING_SAMPLE_BYTES + 10, 0x61));
        const detector = new FixedDetector({ encoding: "latin1", confidence: 0.9 });

        expect(await new EncodingResolver(fileSystem, detector).resolve("/work/big.txt")).toBe("latin1");
        expect(detector.samples).toEqual([ENCODING_SAMPLE_BYTES]);
    });

    it("never throws for an unreadable file", async () => {
        const resolver = new EncodingResolver(new MemoryFileSystem("/work"), new FixedDetector(undefined), "latin1");
        await expect(resolver.resolve("/work/missing.txt")).resolves.toBe("latin1");
    });
});

describe("ChardetEncodingDetector", () => {
    const detector = new ChardetEncodingDetector();

    it("reports valid UTF-8 with full confidence", () => {
        expect(detector.detect(Buffer.from("plain ✓ text"))).toEqual({ encoding: "utf-8", confidence: 1 });
    });

    it("tolerates a character cut at the end of the sample", () => {
        const bytes = Buffer.from("abc✓");
        expect(detector.detect(bytes.subarray(0, bytes.length - 1))).toEqual({ encoding: "utf-8", confidence: 1 });
    });

    it("scales chardet confidence into the unit interval", () => {
        const suggestion = detector.detect(Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x20, 0x74, 0x72, 0xe8, 0x73]));
        const inRange = suggestion === undefined || (suggestion.confidence >= 0 && suggestion.confidence <= 1);
        expect(inRange).toBe(true);
    });
});
