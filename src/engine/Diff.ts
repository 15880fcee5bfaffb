import { splitLines, stripLineTerminator } from "./FileAccess.js";

type ChangeType = "equal" | "insert" | "delete";

export interface Change {
    type: ChangeType;
    value: string;
}

export interface DiffSummary {
    diff: string;
    added: number;
    removed: number;
}

export class MyersDiff {
    public static diffLines(a: string[], b: string[]): Change[] {
        const n = a.length;
        const m = b.length;
        const max = n + m;
        const offset = max + 1;
        const v = new Int32Array(2 * offset + 1);
        const trace: Int32Array[] = [];

        for (let d = 0; d <= max; d++) {
            trace.push(v.slice());
            for (let k = -d; k <= d; k += 2) {
                let x: number;
                if (k === -d || (k !== d && v[offset + k - 1] < v[offset + k + 1])) {
                    x = v[offset + k + 1]; // down: insertion
                } else {
                    x = v[offset + k - 1] + 1; // right: deletion
                }
                let y = x - k;
                while (x < n && y < m && a[x] === b[y]) {
                    x++;
                    y++;
                }
                v[offset + k] = x;
                if (x >= n && y >= m) {
                    return this.backtrack(trace, a, b, offset);
                }
            }
        }
        return [];
    }

    private static backtrack(trace: Int32Array[], a: string[], b: string[], offset: number): Change[] {
        const changes: Change[] = [];
        let x = a.length;
        let y = b.length;

        for (let d = trace.length - 1; d >= 0; d--) {
            const v = trace[d];
            const k = x - y;
            const prevK = (k === -d || (k !== d && v[offset + k - 1] < v[offset + k + 1])) ? k + 1 : k - 1;
            const prevX = v[offset + prevK];
            const prevY = prevX - prevK;

            while (x > prevX && y > prevY) {
                changes.unshift({ type: "equal", value: a[x - 1] });
                x--;
                y--;
            }

            if (d > 0) {
                if (x === prevX) {
                    changes.unshift({ type: "insert", value: b[y - 1] });
                    y--;
                } else {
                    changes.unshift({ type: "delete", value: a[x - 1] });
                    x--;
                }
            }
        }
        return changes;
    }
}

/**
 * Unified diff of the region where `before` and `after` differ, with
 * `contextLines` of unchanged text on each side. Unchanged head and tail
 * lines are skipped before diffing, so cost tracks the edit, not the file.
 * `lineOffset` numbers the hunk for an excerpt that starts after that many
 * lines of the file.
 */
export function renderUnifiedPreview(
    before: string,
    after: string,
    contextLines = 3,
    label = "file",
    lineOffset = 0
): DiffSummary {
    const oldLines = splitLines(before).map(stripLineTerminator);
    const newLines = splitLines(after).map(stripLineTerminator);

    let prefix = 0;
    const shorter = Math.min(oldLines.length, newLines.length);
    while (prefix < shorter && oldLines[prefix] === newLines[prefix]) {
        prefix++;
    }
    let suffix = 0;
    while (
        suffix < shorter - prefix
        && oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
    ) {
        suffix++;
    }

    const header = [`--- ${label} (original)`, `+++ ${label} (modified)`];
    if (prefix === oldLines.length && prefix === newLines.length) {
        return { diff: [...header, "(no changes)"].join("\n"), added: 0, removed: 0 };
    }

    const windowStart = Math.max(0, prefix - contextLines);
    const oldEnd = Math.min(oldLines.length, oldLines.length - suffix + contextLines);
    const newEnd = Math.min(newLines.length, newLines.length - suffix + contextLines);
    const oldWindow = oldLines.slice(windowStart, oldEnd);
    const newWindow = newLines.slice(windowStart, newEnd);

    const changes = MyersDiff.diffLines(oldWindow, newWindow);
    let added = 0;
    let removed = 0;
    const body = changes.map((change) => {
        if (change.type === "insert") {
            added++;
            return `+${change.value}`;
        }
        if (change.type === "delete") {
            removed++;
            return `-${change.value}`;
        }
        return ` ${change.value}`;
    });

    const first = lineOffset + windowStart;
    const hunk = `@@ -${rangeLabel(first, oldWindow.length)} +${rangeLabel(first, newWindow.length)} @@`;
    return { diff: [...header, hunk, ...body].join("\n"), added, removed };
}

function rangeLabel(start: number, length: number): string {
    // unified format numbers an empty range from the line before it
    return length === 0 ? `${start},0` : `${start + 1},${length}`;
}
