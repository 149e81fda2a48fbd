import { describe, it, expect } from "vitest";
import { formatHunks, newLineRanges, parsePatch } from "../../src/utils/diff-parser.js";
import { MULTI_HUNK_PATCH, NO_NEWLINE_PATCH, SIMPLE_PATCH } from "../fixtures/sample-patch.js";

describe("diff-parser", () => {
  it("parses a simple patch with additions and deletions", () => {
    const result = parsePatch("greet.ts", SIMPLE_PATCH, "modified");

    expect(result.filename).toBe("greet.ts");
    expect(result.status).toBe("modified");
    expect(result.additions).toBe(2);
    expect(result.deletions).toBe(1);
    expect(result.hunks).toHaveLength(1);
  });

  it("tracks old and new line numbers", () => {
    const [hunk] = parsePatch("greet.ts", SIMPLE_PATCH, "modified").hunks;

    expect(hunk?.lines.map((l) => [l.type, l.oldLineNumber, l.newLineNumber])).toEqual([
      ["context", 1, 1],
      ["del", 2, null],
      ["add", null, 2],
      ["add", null, 3],
      ["context", 3, 4],
    ]);
  });

  it("parses multi-hunk patches", () => {
    const result = parsePatch("load.ts", MULTI_HUNK_PATCH, "modified");

    expect(result.hunks).toHaveLength(2);
    expect(result.additions).toBe(3);
    expect(newLineRanges(result)).toEqual([
      [10, 12],
      [40, 42],
    ]);
  });

  it("defaults missing hunk counts to one and skips no-newline markers", () => {
    const result = parsePatch("a.txt", NO_NEWLINE_PATCH, "modified");

    expect(result.hunks[0]).toMatchObject({ oldStart: 1, oldCount: 1, newStart: 1, newCount: 1 });
    expect(result.hunks[0]?.lines.map((l) => l.content)).toEqual(["old", "new"]);
  });

  it("handles empty patch gracefully", () => {
    const result = parsePatch("empty.ts", undefined, "added");

    expect(result.filename).toBe("empty.ts");
    expect(result.status).toBe("added");
    expect(result.hunks).toHaveLength(0);
    expect(result.additions).toBe(0);
    expect(result.deletions).toBe(0);
    expect(newLineRanges(result)).toEqual([]);
  });

  it("normalizes file status correctly", () => {
    expect(parsePatch("a.ts", "", "added").status).toBe("added");
    expect(parsePatch("b.ts", "", "removed").status).toBe("removed");
    expect(parsePatch("c.ts", "", "renamed").status).toBe("renamed");
    expect(parsePatch("d.ts", "", "modified").status).toBe("modified");
    expect(parsePatch("e.ts", "", "changed").status).toBe("modified");
  });

  it("formats hunks with new-side line markers", () => {
    const file = parsePatch("greet.ts", SIMPLE_PATCH, "modified");

    expect(formatHunks(file)).toBe(
      [
        "@@ -1,3 +1,4 @@",
        " L1: export function greet(name: string) {",
        '-L2:   return "hi " + name;',
        "+L2:   const trimmed = name.trim();",
        '+L3:   return "hi " + trimmed;',
        " L4: }",
      ].join("\n")
    );
  });
});
