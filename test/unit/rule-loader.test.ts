import { describe, it, expect, beforeEach } from "vitest";
import { RuleLoader } from "../../src/config-loader/loader.js";
import { parseRulesFile } from "../../src/config-loader/schema.js";
import { FakeProvider, REPO, RULES_PATH, httpError } from "../fixtures/fakes.js";
import { RULES_YAML } from "../fixtures/sample-patch.js";

describe("parseRulesFile", () => {
  it("treats an empty document as no rules", () => {
    expect(parseRulesFile(null)).toEqual({ rules: [] });
    expect(parseRulesFile(undefined)).toEqual({ rules: [] });
  });

  it("defaults a missing rules key", () => {
    expect(parseRulesFile({})).toEqual({ rules: [] });
  });

  it("rejects non-string rules", () => {
    expect(() => parseRulesFile({ rules: [42] })).toThrow();
  });
});

describe("RuleLoader", () => {
  let provider: FakeProvider;
  let loader: RuleLoader;

  beforeEach(() => {
    provider = new FakeProvider();
    loader = new RuleLoader(RULES_PATH);
  });

  it("loads and trims rules", async () => {
    provider.rulesFile = RULES_YAML;

    const { ruleSet, error } = await loader.load(provider, REPO);

    expect(error).toBeNull();
    expect(ruleSet).toEqual({
      repositoryId: REPO,
      rules: ["Every exported function needs a doc comment.", "Never log secrets."],
    });
  });

  it("returns an empty rule set when the file is absent", async () => {
    const { ruleSet, error } = await loader.load(provider, REPO);

    expect(error).toBeNull();
    expect(ruleSet.rules).toEqual([]);
  });

  it("reports a malformed file and continues with no rules", async () => {
    provider.rulesFile = "rules: [unclosed";

    const { ruleSet, error } = await loader.load(provider, REPO);

    expect(ruleSet.rules).toEqual([]);
    expect(error?.kind).toBe("rule_load");
    expect(error?.repositoryId).toBe(REPO);
  });

  it("reports a file of the wrong shape", async () => {
    provider.rulesFile = "rules: just one string";

    const { error } = await loader.load(provider, REPO);

    expect(error?.message).toContain("rules");
  });

  it("caches per repository until invalidated", async () => {
    provider.rulesFile = "rules:\n  - first";
    await loader.load(provider, REPO);
    provider.rulesFile = "rules:\n  - second";

    expect((await loader.load(provider, REPO)).ruleSet.rules).toEqual(["first"]);

    loader.invalidate(REPO);
    expect((await loader.load(provider, REPO)).ruleSet.rules).toEqual(["second"]);
    expect(provider.contentCalls).toEqual([RULES_PATH, RULES_PATH]);
  });

  it("does not cache fetch failures", async () => {
    provider.rulesError = new Error("socket hang up");

    const first = await loader.load(provider, REPO);
    expect(first.error?.message).toBe(`Could not load rules for ${REPO}: file could not be fetched`);

    provider.rulesError = null;
    provider.rulesFile = "rules:\n  - recovered";
    // Let the cache bookkeeping settle
    await new Promise((r) => setTimeout(r, 0));

    const second = await loader.load(provider, REPO);
    expect(second.ruleSet.rules).toEqual(["recovered"]);
    expect(second.error).toBeNull();
  });

  it("retries a transient failure before giving up on the file", async () => {
    const retrying = new RuleLoader(RULES_PATH, { fetchTimeoutMs: 1000, maxAttempts: 3, retryBaseDelayMs: 1 });
    provider.rulesErrors = [httpError(502)];
    provider.rulesFile = RULES_YAML;

    const { ruleSet, error } = await retrying.load(provider, REPO);

    expect(error).toBeNull();
    expect(ruleSet.rules).toHaveLength(2);
    expect(provider.contentCalls).toEqual([RULES_PATH, RULES_PATH]);
  });

  it("stops waiting on a rules fetch that hangs", async () => {
    const impatient = new RuleLoader(RULES_PATH, { fetchTimeoutMs: 20, maxAttempts: 1, retryBaseDelayMs: 1 });
    provider.rulesFile = RULES_YAML;
    provider.rulesDelayMs = 5000;

    const { ruleSet, error } = await impatient.load(provider, REPO);

    expect(ruleSet.rules).toEqual([]);
    expect(error?.message).toBe(`Could not load rules for ${REPO}: file could not be fetched`);
  });
});
