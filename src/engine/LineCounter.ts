/**
 * Offset to line mapping over a decoded file body. Lines break on `\n`.
 */
export class LineCounter {
    private readonly lineStarts: number[];

    constructor(private readonly content: string) {
        this.lineStarts = [0];
        let newline = content.indexOf("\n");
        while (newline !== -1) {
            this.lineStarts.push(newline + 1);
            newline = content.indexOf("\n", newline + 1);
        }
    }

    /** 1-based line holding the 0-based character `offset` (binary search). */
    public lineNumberAt(offset: number): number {
        if (offset <= 0) return 1;

        let low = 0;
        let high = this.lineStarts.length - 1;
        while (low <= high) {
            const mid = (low + high) >> 1;
            const start = this.lineStarts[mid];
            if (start === offset) return mid + 1;
            if (start < offset) {
                low = mid + 1;
            } else {
                high = mid - 1;
            }
        }
        return high + 1;
    }

    /**
     * Character range of a 1-based line. `end` stops before the line
     * terminator (`\n` or `\r\n`); `next` is where the following line starts.
     */
    public lineBounds(lineNumber: number): { start: number; end: number; next: number } {
        const index = Math.min(Math.max(lineNumber, 1), this.lineStarts.length) - 1;
        const start = this.lineStarts[index];
        const next = index + 1 < this.lineStarts.length ? this.lineStarts[index + 1] : this.content.length;
        let end = next;
        if (end > start && this.content[end - 1] === "\n") end--;
        if (end > start && this.content[end - 1] === "\r") end--;
        return { start, end, next };
    }
}
