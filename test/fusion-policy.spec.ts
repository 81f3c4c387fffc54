import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { PolicyConfigError } from "../src/errors";
import {
  DEFAULT_RULE_FLAGS,
  FusibilityTable,
  FusionPolicy,
  type FusionUnit,
} from "../src/policy/fusion-policy";
import {
  loadDefaultPolicy,
  parseFusionPolicyConfig,
  readFusionPolicy,
} from "../src/policy/policy-config";

describe("FusibilityTable", () => {
  it("is order-sensitive and closed-world", () => {
    const table = new FusibilityTable([
      ["Conv2D", "Relu", true],
      ["Relu", "Add", false],
    ]);
    expect(table.isFusible("Conv2D", "Relu")).toBe(true);
    expect(table.isFusible("Relu", "Conv2D")).toBe(false);
    expect(table.isFusible("Relu", "Add")).toBe(false);
    expect(table.isFusible("MatMul", "BiasAdd")).toBe(false);
    expect(table.size).toBe(2);
  });

  it("builds from a nested mapping", () => {
    const table = FusibilityTable.fromNested({
      Conv2D: { Relu: true, BiasAdd: true },
      BiasAdd: { Relu: true },
    });
    expect(table.entries()).toEqual([
      ["Conv2D", "Relu", true],
      ["Conv2D", "BiasAdd", true],
      ["BiasAdd", "Relu", true],
    ]);
  });
});

describe("FusionPolicy", () => {
  const convRelu: FusionUnit = {
    name: "conv-relu",
    nodes: { conv: ["Conv2D"], relu: ["Relu"] },
    edges: [["conv", "relu"]],
  };

  it("defaults to first-consumer fusion without readiness", () => {
    const policy = new FusionPolicy();
    expect(policy.flags).toEqual(DEFAULT_RULE_FLAGS);
    expect(policy.flags).toEqual({ multiOutput: "first", requireReady: false });
    expect(policy.units).toEqual([]);
  });

  it("freezes units and flags", () => {
    const policy = new FusionPolicy({ units: [convRelu] });
    expect(Object.isFrozen(policy.flags)).toBe(true);
    expect(Object.isFrozen(policy.units)).toBe(true);
    expect(Object.isFrozen(policy.units[0].nodes.conv)).toBe(true);
  });

  it("derives a policy with other flags", () => {
    const policy = new FusionPolicy({ units: [convRelu] });
    const strict = policy.withFlags({ multiOutput: "forbid" });
    expect(strict.flags).toEqual({ multiOutput: "forbid", requireReady: false });
    expect(strict.units.map((unit) => unit.name)).toEqual(["conv-relu"]);
    expect(policy.flags.multiOutput).toBe("first");
  });

  it("rejects malformed units", () => {
    expect(() => new FusionPolicy({ units: [convRelu, convRelu] })).toThrow(
      PolicyConfigError,
    );
    expect(
      () => new FusionPolicy({ units: [{ name: "empty", nodes: {}, edges: [] }] }),
    ).toThrow(PolicyConfigError);
    expect(
      () =>
        new FusionPolicy({
          units: [{ name: "none", nodes: { a: [] }, edges: [] }],
        }),
    ).toThrow(PolicyConfigError);
    expect(
      () =>
        new FusionPolicy({
          units: [{ name: "dangling", nodes: { a: ["Relu"] }, edges: [["a", "b"]] }],
        }),
    ).toThrow(/undefined alias b/);
  });
});

describe("policy documents", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("accepts named and numeric multiplicity modes", () => {
    expect(parseFusionPolicyConfig({ flags: { multiOutput: "all" } }).flags).toEqual({
      multiOutput: "all",
      requireReady: false,
    });
    expect(
      parseFusionPolicyConfig({ flags: { multiOutput: 0, requireReady: true } }).flags,
    ).toEqual({ multiOutput: "forbid", requireReady: true });
    expect(parseFusionPolicyConfig({ flags: { multiOutput: 2 } }).flags.multiOutput).toBe(
      "all",
    );
  });

  it("rejects unknown modes and keys", () => {
    expect(() => parseFusionPolicyConfig({ flags: { multiOutput: "sometimes" } })).toThrow(
      PolicyConfigError,
    );
    expect(() => parseFusionPolicyConfig({ flags: { multiOutput: 3 } })).toThrow(
      PolicyConfigError,
    );
    expect(() => parseFusionPolicyConfig({ rules: {} })).toThrow(PolicyConfigError);
  });

  it("rejects edges naming undefined aliases", () => {
    expect(() =>
      parseFusionPolicyConfig({
        units: [{ name: "u", nodes: { a: ["Relu"] }, edges: [["a", "missing"]] }],
      }),
    ).toThrow(PolicyConfigError);
  });

  it("loads the bundled policy", () => {
    const policy = loadDefaultPolicy();
    expect(policy.units.map((unit) => unit.name)).toEqual([
      "conv-bn-relu",
      "dwconv-bn-relu",
      "fc-bias",
    ]);
    expect(policy.flags).toEqual({ multiOutput: "first", requireReady: false });
    expect(policy.isFusible("Conv2D", "Relu")).toBe(true);
    expect(policy.isFusible("Relu", "Conv2D")).toBe(false);
    expect(policy.isFusible("conv-bn-relu", "Add")).toBe(true);
  });

  it("reads a policy file", () => {
    dir = mkdtempSync(join(tmpdir(), "kernelcut-"));
    const path = join(dir, "policy.json");
    writeFileSync(
      path,
      JSON.stringify({
        flags: { multiOutput: 1 },
        fusible: { MatMul: { BiasAdd: true } },
      }),
    );
    const policy = readFusionPolicy(path);
    expect(policy.flags.multiOutput).toBe("first");
    expect(policy.isFusible("MatMul", "BiasAdd")).toBe(true);
  });

  it("wraps unreadable files", () => {
    dir = mkdtempSync(join(tmpdir(), "kernelcut-"));
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => readFusionPolicy(path)).toThrow(PolicyConfigError);
    const missing = join(dir, "missing.json");
    expect(() => readFusionPolicy(missing)).toThrow(
      PolicyConfigError,
    );
  });
});
