import { describe, it, expect } from "@jest/globals";
import { createDecoder, createEncoder, decode, encode, isSupportedEncoding, normalizeEncodingName } from "../../encoding/TextCodec.js";

describe("TextCodec", () => {
    it("normalizes encoding names", () => {
        expect(normalizeEncodingName("UTF8")).toBe("utf-8");
        expect(normalizeEncodingName(" Latin1 ")).toBe("latin1");
        expect(isSupportedEncoding("shift_jis")).toBe(true);
        expect(isSupportedEncoding("klingon")).toBe(false);
    });

    it("keeps a leading byte order mark", () => {
        expect(decode(Buffer.from([0xef, 0xbb, 0xbf, 0x61]), "utf-8", "f")).toBe("\uFEFFa");
    });

    it("rejects malformed UTF-8 instead of substituting", () => {
        expect(() => decode(Buffer.from([0x61, 0xff]), "utf-8", "f")).toThrow(
            expect.objectContaining({ name: "AccessError", kind: "decode-failed", filePath: "f" })
        );
    });

    it("rejects unknown encodings on both directions", () => {
        expect(() => decode(Buffer.from("a"), "klingon", "f")).toThrow("Cannot decode f: unsupported encoding klingon");
        expect(() => encode("a", "klingon", "f")).toThrow(expect.objectContaining({ kind: "write-failed" }));
    });

    it("encodes a surrogate pair split across writes", () => {
        const encoder = createEncoder("utf-8", "f");
        const smile = "\u{1F600}";
        const bytes = Buffer.concat([encoder.write(`a${smile[0]}`), encoder.write(`${smile[1]}b`), encoder.end()]);
        expect(bytes.toString("utf8")).toBe(`a${smile}b`);
    });

    it("encodes pieces the same way as the whole text", () => {
        const encoder = createEncoder("latin1", "f");
        const bytes = Buffer.concat([encoder.write("caf"), encoder.write("é\n"), encoder.end()]);
        expect([...bytes]).toEqual([...encode("café\n", "latin1", "f")]);
        expect(() => createEncoder("klingon", "f")).toThrow(expect.objectContaining({ kind: "write-failed" }));
    });

    it("round-trips multi-byte legacy encodings", () => {
        const bytes = encode("日本語\n", "shift_jis", "f");
        expect(bytes.length).toBe(7);
        expect(decode(bytes, "shift_jis", "f")).toBe("日本語\n");
    });

    it("joins a character split across chunks", () => {
        const decoder = createDecoder("utf-8", "f");
        expect(decoder.write(Buffer.from([0x61, 0xc3]))).toBe("a");
        expect(decoder.write(Buffer.from([0xa9]))).toBe("é");
        expect(decoder.end()).toBe("");
    });

    it("rejects a truncated trailing sequence on end", () => {
        const decoder = createDecoder("utf-8", "f");
        expect(decoder.write(Buffer.from([0x61, 0xe6]))).toBe("a");
        expect(() => decoder.end()).toThrow(expect.objectContaining({ kind: "decode-failed" }));
    });
});
