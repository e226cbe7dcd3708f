import { describe, it, expect } from "vitest";
import type { ChangeRecord, CommitNode, Hunk } from "../../src/models.js";
import { changeKindCode } from "../../src/models.js";
import { toWire, toWireHunk, wirePatchSchema } from "../../src/wire.js";

const IDENTITY = { name: "Test", email: "test@test.com", date: "1700000000 +0000" };

function commit(secondary_hash?: string | null): CommitNode {
  return {
    sha: "a".repeat(40),
    parents: ["b".repeat(40)],
    tree: "c".repeat(40),
    author: IDENTITY,
    committer: IDENTITY,
    message: "Edit file\n",
    secondary_hash,
  };
}

const HUNK: Hunk = {
  old_offset: 1,
  old_length: 1,
  new_offset: 1,
  new_length: 2,
  old_eof_newline: false,
  new_eof_newline: true,
  add_lines: 2,
  del_lines: 1,
  corpus: "-x\n\\ No newline at end of file\n+x\n+y\n",
};

describe("toWire", () => {
  it("projects a text change", () => {
    const change: ChangeRecord = {
      current_path: "file.txt",
      old_path: "file.txt",
      away_paths: [],
      kind: "CHANGE",
      binary: false,
      file_type: "TEXT",
      uploads: [],
      hunks: [HUNK],
    };

    const patch = toWire(change, commit("d".repeat(40)));

    expect(patch).toEqual({
      metadata: {},
      oldPath: "file.txt",
      currentPath: "file.txt",
      awayPaths: [],
      oldProperties: {},
      newProperties: {},
      commitHash: "d".repeat(40),
      type: 2,
      fileType: 1,
      hunks: [
        {
          oldOffset: 1,
          oldLength: 1,
          newOffset: 1,
          newLength: 2,
          addLines: 2,
          delLines: 1,
          isMissingOldNewline: true,
          isMissingNewNewline: false,
          corpus: "-x\n\\ No newline at end of file\n+x\n+y\n",
        },
      ],
    });
    expect(wirePatchSchema.safeParse(patch).success).toBe(true);
  });

  it("carries file modes, away paths and a null old path", () => {
    const added = toWire(
      {
        current_path: "bin/run",
        away_paths: [],
        new_mode: "100755",
        kind: "ADD",
        uploads: [],
        hunks: [],
      },
      commit("d".repeat(40)),
    );
    expect(added.oldPath).toBeNull();
    expect(added.oldProperties).toEqual({});
    expect(added.newProperties).toEqual({ "unix:filemode": "100755" });
    expect(added.fileType).toBe(1);

    const source = toWire(
      {
        current_path: "origin.txt",
        old_path: "origin.txt",
        away_paths: ["a.txt", "b.txt"],
        old_mode: "100644",
        kind: "MULTICOPY",
        uploads: [],
        hunks: [],
      },
      commit("d".repeat(40)),
    );
    expect(source.awayPaths).toEqual(["a.txt", "b.txt"]);
    expect(source.oldProperties).toEqual({ "unix:filemode": "100644" });
    expect(source.type).toBe(8);
  });

  it("describes binary uploads in metadata", () => {
    const change: ChangeRecord = {
      current_path: "logo.png",
      old_path: "logo.png",
      away_paths: [],
      kind: "CHANGE",
      binary: true,
      file_type: "IMAGE",
      uploads: [
        { side: "old", body: Buffer.from([1, 0]), mime_type: "image/png", upload_id: "PHID-FILE-old" },
        { side: "new", body: Buffer.from([1, 0, 2]), mime_type: "image/png", upload_id: "PHID-FILE-new" },
      ],
      hunks: [],
    };

    const patch = toWire(change, commit("d".repeat(40)));

    expect(patch.fileType).toBe(2);
    expect(patch.metadata).toEqual({
      "old:binary-id": "PHID-FILE-old",
      "old:file:size": 2,
      "old:file:mime-type": "image/png",
      "new:binary-id": "PHID-FILE-new",
      "new:file:size": 3,
      "new:file:mime-type": "image/png",
    });
  });

  it("rejects an upload without an id", () => {
    const change: ChangeRecord = {
      current_path: "data.bin",
      away_paths: [],
      kind: "ADD",
      binary: true,
      file_type: "BINARY",
      uploads: [{ side: "new", body: Buffer.from([0]), mime_type: "application/octet-stream" }],
      hunks: [],
    };

    expect(() => toWire(change, commit("d".repeat(40)))).toThrow(
      "Upload of new data.bin has no id",
    );
  });

  it.each([undefined, null])("rejects a commit whose secondary hash is %s", (value) => {
    const change: ChangeRecord = {
      current_path: "file.txt",
      away_paths: [],
      kind: "ADD",
      uploads: [],
      hunks: [],
    };

    expect(() => toWire(change, commit(value))).toThrow(
      `Commit ${"a".repeat(40)} has no secondary hash; resolve it before translating`,
    );
  });

  it("rejects a change without a kind", () => {
    expect(() =>
      toWire({ current_path: "file.txt", away_paths: [], uploads: [], hunks: [] }, commit("d".repeat(40))),
    ).toThrow("Change for file.txt has no kind");
  });
});

describe("toWireHunk", () => {
  it("inverts the newline flags", () => {
    const hunk = toWireHunk({ ...HUNK, old_eof_newline: true, new_eof_newline: false });
    expect(hunk.isMissingOldNewline).toBe(false);
    expect(hunk.isMissingNewNewline).toBe(true);
  });
});

describe("changeKindCode", () => {
  it("numbers kinds in review-service order", () => {
    const kinds = [
      "ADD",
      "CHANGE",
      "DELETE",
      "MOVE_AWAY",
      "COPY_AWAY",
      "MOVE_HERE",
      "COPY_HERE",
      "MULTICOPY",
    ] as const;
    expect(kinds.map(changeKindCode)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });
});
