import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { AmbiguousPrefixesError, AmbiguousSuffixesError, ConflictingFilesError } from "../errors.js";
import { buildRenamePlan } from "../plan.js";
import { checkDestinations, checkPrefixesAndSuffixes, validateRenamePlan } from "../validate.js";
import { MemoryFileSystem, PARIS_NAMES, parsed } from "./memory-fs.js";

const DIR = "/photos";

function setup(names: readonly string[]) {
  const fs = new MemoryFileSystem(DIR, names);
  const plan = buildRenamePlan(names.map((n) => parsed(join(DIR, n))));
  return { fs, plan };
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  throw new Error("expected function to throw");
}

describe("validateRenamePlan", () => {
  it("accepts a single series with free targets", () => {
    const { fs, plan } = setup(PARIS_NAMES);
    expect(() => validateRenamePlan(plan, DIR, fs)).not.toThrow();
  });

  it("accepts an empty plan", () => {
    const { fs, plan } = setup([]);
    expect(() => validateRenamePlan(plan, DIR, fs)).not.toThrow();
  });

  it("reports prefix ambiguity before destination conflicts", () => {
    const { fs, plan } = setup(["a (1).jpg", "a (001).jpg", "b (100).jpg"]);
    expect(() => validateRenamePlan(plan, DIR, fs)).toThrow(AmbiguousPrefixesError);
  });
});

describe("checkPrefixesAndSuffixes", () => {
  it("never tolerates prefixes that differ only in case", () => {
    const { plan } = setup(["img (1).jpg", "IMG (2).jpg"]);
    const err = thrown(() => checkPrefixesAndSuffixes(plan));
    expect(err).toBeInstanceOf(AmbiguousPrefixesError);
    expect(err).toMatchObject({ prefixes: ["IMG (", "img ("] });
  });

  it("tolerates two suffixes that differ only in case", () => {
    const { plan } = setup(["img (1).jpg", "img (2).JPG", "img (3).jpg"]);
    expect(() => checkPrefixesAndSuffixes(plan)).not.toThrow();
  });

  it("rejects three case variants of one suffix", () => {
    const { plan } = setup(["img (1).jpg", "img (2).JPG", "img (3).Jpg"]);
    const err = thrown(() => checkPrefixesAndSuffixes(plan));
    expect(err).toBeInstanceOf(AmbiguousSuffixesError);
    expect(err).toMatchObject({ suffixes: [").JPG", ").Jpg", ").jpg"] });
  });

  it("rejects different suffixes", () => {
    const { plan } = setup(["img (1).jpg", "img (2).png"]);
    const err = thrown(() => checkPrefixesAndSuffixes(plan));
    expect(err).toBeInstanceOf(AmbiguousSuffixesError);
    expect(err).toMatchObject({ suffixes: [").jpg", ").png"] });
  });
});

describe("checkDestinations", () => {
  it("rejects a target that already exists", () => {
    const { fs, plan } = setup(["paris (1).jpg", "paris (001).jpg", "paris (734).jpg"]);
    const err = thrown(() => checkDestinations(plan, DIR, fs));
    expect(err).toBeInstanceOf(ConflictingFilesError);
    expect(err).toMatchObject({ paths: [join(DIR, "paris (001).jpg")] });
  });

  it("reports every conflicting target", () => {
    const { fs, plan } = setup(["a (1).jpg", "a (2).jpg", "a (3).jpg", "a (001).jpg", "a (002).jpg", "a (100).jpg"]);
    const err = thrown(() => checkDestinations(plan, DIR, fs));
    expect(err).toMatchObject({ paths: [join(DIR, "a (001).jpg"), join(DIR, "a (002).jpg")] });
  });

  it("rejects two entries that claim the same target", () => {
    const { fs, plan } = setup(["a (01).jpg", "a (0001).jpg", "a (100).jpg"]);
    const err = thrown(() => checkDestinations(plan, DIR, fs));
    expect(err).toBeInstanceOf(ConflictingFilesError);
    expect(err).toMatchObject({ paths: [join(DIR, "a (001).jpg")] });
  });
});
