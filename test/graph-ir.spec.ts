import { describe, expect, it, vi } from "vitest";

import {
  GraphCycleError,
  GraphIngestError,
  UnknownNodeError,
} from "../src/errors";
import { GraphIR } from "../src/graph/graph-ir";
import { makeGraph } from "./helpers/graphs";

describe("GraphIR ingestion", () => {
  it("mirrors one-sided edges onto the other endpoint", () => {
    const graph = GraphIR.fromRecords({
      a: { type: "Placeholder", outbounds: ["b"] },
      b: { type: "Relu" },
      c: { type: "Relu", inbounds: ["b"] },
    });
    expect(graph.require("b").inbounds).toEqual(["a"]);
    expect(graph.require("b").outbounds).toEqual(["c"]);
    expect(graph.require("a").outbounds).toEqual(["b"]);
  });

  it("keeps each node's declared edge order", () => {
    const graph = GraphIR.fromRecords({
      e: { type: "E", inbounds: ["d"] },
      f: { type: "F", inbounds: ["d"] },
      d: { type: "D", outbounds: ["f", "e"] },
      cat: { type: "ConcatV2", inbounds: ["f", "e"] },
    });
    expect(graph.require("d").outbounds).toEqual(["f", "e"]);
    expect(graph.require("cat").inbounds).toEqual(["f", "e"]);
    // mirrored edges land after the declared ones
    expect(graph.require("e").outbounds).toEqual(["cat"]);
    expect(graph.topologicalOrder().map((node) => node.id)).toEqual([
      "d",
      "f",
      "e",
      "cat",
    ]);
  });

  it("appends mirrored edges after the declared list", () => {
    const graph = GraphIR.fromRecords({
      a: { type: "Placeholder", outbounds: ["c"] },
      b: { type: "Placeholder", outbounds: ["c"] },
      c: { type: "Add", inbounds: ["b"] },
    });
    expect(graph.require("c").inbounds).toEqual(["b", "a"]);
  });

  it("does not duplicate edges listed on both endpoints", () => {
    const graph = GraphIR.fromRecords({
      a: { type: "Placeholder", outbounds: ["b"] },
      b: { type: "Relu", inbounds: ["a"] },
    });
    expect(graph.require("a").outbounds).toEqual(["b"]);
    expect(graph.require("b").inbounds).toEqual(["a"]);
  });

  it("rejects edges to unknown nodes", () => {
    expect(() =>
      GraphIR.fromRecords({ a: { type: "Relu", inbounds: ["ghost"] } }),
    ).toThrow(GraphIngestError);
  });

  it("rejects malformed records", () => {
    expect(() => GraphIR.fromRecords({ a: { type: "" } })).toThrow(
      GraphIngestError,
    );
    expect(() => GraphIR.fromRecords([1, 2])).toThrow(GraphIngestError);
  });

  it("builds edges with connect", () => {
    const graph = new GraphIR();
    graph.addNode("a", "Placeholder");
    graph.addNode("b", "Relu");
    graph.connect("a", "b");
    graph.connect("a", "b");
    expect(graph.require("a").outbounds).toEqual(["b"]);
    expect(graph.require("b").inbounds).toEqual(["a"]);
    expect(() => graph.connect("a", "ghost")).toThrow(UnknownNodeError);
  });

  it("rejects duplicate ids on addNode", () => {
    const graph = new GraphIR();
    graph.addNode("a", "Relu");
    expect(() => graph.addNode("a", "Relu")).toThrow(GraphIngestError);
  });

  it("throws UnknownNodeError from require", () => {
    expect(() => new GraphIR().require("nope")).toThrow(UnknownNodeError);
  });
});

describe("GraphIR traversal", () => {
  it("orders producers before consumers, ties in arena order", () => {
    const graph = makeGraph(
      { w: "Relu", z: "Add", x: "Placeholder", y: "Placeholder" },
      [
        ["x", "z"],
        ["y", "z"],
        ["z", "w"],
      ],
    );
    expect(graph.topologicalOrder().map((node) => node.id)).toEqual([
      "x",
      "y",
      "z",
      "w",
    ]);
    expect(graph.heads()).toEqual(["x", "y"]);
  });

  it("restricts the order to nodes reachable from the given heads", () => {
    const graph = makeGraph(
      { a: "Placeholder", b: "Relu", c: "Placeholder", d: "Relu" },
      [
        ["a", "b"],
        ["c", "d"],
      ],
    );
    expect(graph.topologicalOrder(["c"]).map((node) => node.id)).toEqual([
      "c",
      "d",
    ]);
  });

  it("reports cycles", () => {
    const graph = makeGraph({ a: "Relu", b: "Relu" }, [
      ["a", "b"],
      ["b", "a"],
    ]);
    expect(() => graph.topologicalOrder()).toThrow(GraphCycleError);
  });

  it("walks downstream within the hop bound", () => {
    const graph = makeGraph({ a: "Relu", b: "Relu", c: "Relu", d: "Relu" }, [
      ["a", "b"],
      ["b", "c"],
      ["c", "d"],
    ]);
    expect(graph.downstream("a", 2).map((node) => node.id)).toEqual(["b", "c"]);
    expect(graph.downstream("d", 4)).toEqual([]);
  });

  it("detects sets a path leaves and re-enters", () => {
    const graph = makeGraph({ a: "Conv2D", x: "Identity", b: "Relu" }, [
      ["a", "x"],
      ["x", "b"],
      ["a", "b"],
    ]);
    expect(graph.isConvex(["a", "b"])).toBe(false);
    expect(graph.isConvex(["a", "x", "b"])).toBe(true);
    expect(graph.isConvex(["x", "b"])).toBe(true);
  });
});

describe("GraphIR.fuse", () => {
  function chain() {
    const graph = makeGraph(
      { in: "Placeholder", a: "Conv2D", b: "Relu", out: "Relu", side: "Relu" },
      [
        ["in", "a"],
        ["a", "b"],
        ["a", "side"],
        ["b", "out"],
      ],
    );
    graph.require("a").inputShape = [[1, 8, 8, 3]];
    graph.require("b").outputShape = [[1, 8, 8, 16]];
    return graph;
  }

  it("rewires external edges onto the fused node", () => {
    const graph = chain();
    const fused = graph.fuse(["b", "a"], "conv-relu");

    expect(fused.id).toBe("a+b");
    expect(fused.type).toBe("conv-relu");
    expect(fused.inbounds).toEqual(["in"]);
    expect(fused.outbounds).toEqual(["side", "out"]);
    expect(fused.members).toEqual(["a", "b"]);
    expect(fused.attrs).toEqual({ fusedTypes: ["Conv2D", "Relu"] });
    expect(fused.inputShape).toEqual([[1, 8, 8, 3]]);
    expect(fused.outputShape).toEqual([[1, 8, 8, 16]]);

    expect(graph.has("a")).toBe(false);
    expect(graph.has("b")).toBe(false);
    expect(graph.require("in").outbounds).toEqual(["a+b"]);
    expect(graph.require("out").inbounds).toEqual(["a+b"]);
    expect(graph.require("side").inbounds).toEqual(["a+b"]);
  });

  it("orders members by a supplied rank without re-sorting the graph", () => {
    const graph = chain();
    const rank = new Map(
      graph.topologicalOrder().map((node, position) => [node.id, position]),
    );
    const order = vi.spyOn(graph, "topologicalOrder");
    const fused = graph.fuse(["b", "a"], "conv-relu", rank);
    expect(order).not.toHaveBeenCalled();
    expect(fused.members).toEqual(["a", "b"]);
    expect(fused.attrs).toEqual({ fusedTypes: ["Conv2D", "Relu"] });
  });

  it("falls back to a fresh order when the rank misses a member", () => {
    const graph = chain();
    const order = vi.spyOn(graph, "topologicalOrder");
    const fused = graph.fuse(["b", "a"], "conv-relu", new Map([["b", 0]]));
    expect(order).toHaveBeenCalledTimes(1);
    expect(fused.members).toEqual(["a", "b"]);
  });

  it("picks a fresh id when the joined id is taken", () => {
    const graph = makeGraph({ a: "Relu", b: "Relu", "a+b": "Placeholder" }, [
      ["a", "b"],
    ]);
    expect(graph.fuse(["a", "b"], "pair").id).toBe("a+b#1");
  });

  it("keeps members through nested fusion and record round-trips", () => {
    const graph = chain();
    graph.fuse(["a", "b"], "conv-relu");
    const outer = graph.fuse(["a+b", "out"], "block");
    expect(outer.members).toEqual(["a", "b", "out"]);

    const again = GraphIR.fromRecords(graph.toRecords());
    expect(again.ids()).toEqual(graph.ids());
    expect(again.require(outer.id).members).toEqual(["a", "b", "out"]);
  });

  it("rejects empty and duplicate sets", () => {
    const graph = chain();
    expect(() => graph.fuse([], "x")).toThrow(GraphIngestError);
    expect(() => graph.fuse(["a", "a"], "x")).toThrow(GraphIngestError);
  });

  it("leaves clones untouched", () => {
    const graph = chain();
    const copy = graph.clone();
    copy.fuse(["a", "b"], "conv-relu");
    expect(graph.size).toBe(5);
    expect(copy.size).toBe(4);
    expect(graph.require("in").outbounds).toEqual(["a"]);
  });
});
