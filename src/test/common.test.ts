import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { AmbiguousPrefixesError } from "../errors.js";
import {
  checkDir,
  checkNothingToDo,
  errorMessage,
  formatPreview,
  formatSkipped,
  formatSummary,
  nothingToDoMessage,
} from "../commands/common.js";
import { buildRenamePlan, pendingRenames } from "../plan.js";
import { SeriesRenamer } from "../renamer.js";
import { MemoryFileSystem, parsed } from "./memory-fs.js";

describe("formatPreview", () => {
  const plan = buildRenamePlan(["a (1).jpg", "a (2).jpg", "a (3).jpg", "a (10).jpg"].map(parsed));

  it("lists old → new names", () => {
    expect(formatPreview(pendingRenames(plan), 20)).toBe(
      "a (1).jpg → a (01).jpg\na (2).jpg → a (02).jpg\na (3).jpg → a (03).jpg",
    );
  });

  it("caps the number of lines", () => {
    expect(formatPreview(pendingRenames(plan), 2)).toBe(
      "a (1).jpg → a (01).jpg\na (2).jpg → a (02).jpg\n… and 1 more",
    );
  });
});

describe("messages", () => {
  it("formats skipped files with their reason", () => {
    expect(
      formatSkipped([{ filename: "notes.txt", error: { kind: "NoNumberGroup", filename: "notes.txt" } }]),
    ).toBe("notes.txt: no number group like (123) in the name");
  });

  it("tells an empty folder from an already padded one", () => {
    expect(nothingToDoMessage(0)).toBe('No numbered files like "name (1).ext" in that folder.');
    expect(nothingToDoMessage(4)).toBe("All 4 numbered file(s) already have the right padding.");
  });

  it("summarises a run", () => {
    expect(formatSummary(10, 11)).toBe(
      "Renamed 10 of 11 numbered file(s); 1 already had the right padding.",
    );
  });

  it("renders unknown errors", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});

describe("checkNothingToDo", () => {
  function open(names: readonly string[]): SeriesRenamer {
    return SeriesRenamer.open("/photos", new MemoryFileSystem("/photos", names));
  }

  it("rejects an ambiguous set even when no file needs a new name", () => {
    expect(() => checkNothingToDo(open(["a (1).jpg", "b (2).jpg"]))).toThrow(AmbiguousPrefixesError);
  });

  it("reports an already padded series", () => {
    expect(checkNothingToDo(open(["a (10).jpg", "a (20).jpg"]))).toBe(
      "All 2 numbered file(s) already have the right padding.",
    );
  });

  it("reports a folder without numbered files", () => {
    expect(checkNothingToDo(open(["notes.txt"]))).toBe('No numbered files like "name (1).ext" in that folder.');
  });

  it("returns undefined when there is work to do", () => {
    expect(checkNothingToDo(open(["a (1).jpg", "a (10).jpg"]))).toBeUndefined();
  });
});

describe("checkDir", () => {
  it("accepts a directory and rejects missing paths and files", async () => {
    const dir = await mkdtemp(join(tmpdir(), "padnum-common-"));
    try {
      const file = join(dir, "a (1).jpg");
      await writeFile(file, "");
      expect(checkDir(dir)).toBeUndefined();
      expect(checkDir(file)).toBe(`Not a directory: ${file}`);
      expect(checkDir(join(dir, "missing"))).toBe(`Directory does not exist: ${join(dir, "missing")}`);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
