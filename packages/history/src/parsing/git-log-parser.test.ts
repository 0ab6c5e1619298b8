import { describe, expect, it } from "vitest";
import { parseGitLog } from "./git-log-parser.js";

describe("parseGitLog", () => {
  it("parses commits with subjects and resolves renamed destination paths", () => {
    const raw = [
      "\u001eabc123\u001f1700000000\u001fAlice\u001falice@example.com\u001ffeat: add cache",
      "3\t1\tsrc/a.ts",
      "2\t0\tsrc/{old.ts => new.ts}",
      "1\t1\tlib/{ => nested}/util.ts",
      "",
      "\u001edef456\u001f1700003600\u001fBob\u001fbob@example.com\u001fchore: logo",
      "-\t-\tassets/logo.png",
      "",
    ].join("\n");

    const commits = parseGitLog(raw);

    expect(commits).toHaveLength(2);
    expect(commits[0]).toMatchObject({
      sha: "abc123",
      committedAtUnix: 1700000000,
      authorName: "Alice",
      authorEmail: "alice@example.com",
      subject: "feat: add cache",
    });
    expect(commits[0]?.fileChanges).toEqual([
      { filePath: "src/a.ts", additions: 3, deletions: 1 },
      { filePath: "src/new.ts", additions: 2, deletions: 0 },
      { filePath: "lib/nested/util.ts", additions: 1, deletions: 1 },
    ]);
    expect(commits[1]?.fileChanges).toEqual([{ filePath: "assets/logo.png", additions: 0, deletions: 0 }]);
  });

  it("orders commits by time and skips records with broken headers", () => {
    const raw = [
      "\u001elater\u001f1700000500\u001fBob\u001fbob@example.com\u001fsecond",
      "\u001ebroken\u001fnot-a-number\u001fBob\u001fbob@example.com\u001fbroken",
      "\u001eearlier\u001f1700000100\u001fAlice\u001falice@example.com\u001ffirst",
      "\u001etruncated\u001f1700000200",
    ].join("\n");

    expect(parseGitLog(raw).map((commit) => commit.sha)).toEqual(["earlier", "later"]);
  });

  it("reports progress for every record", () => {
    const raw = "\u001ea\u001f1\u001fA\u001fa@example.com\u001fone\n\u001eb\u001f2\u001fB\u001fb@example.com\u001ftwo";
    const events: Array<{ parsedRecords: number; totalRecords: number }> = [];

    parseGitLog(raw, (event) => events.push(event));

    expect(events).toEqual([
      { parsedRecords: 1, totalRecords: 2 },
      { parsedRecords: 2, totalRecords: 2 },
    ]);
  });
});
