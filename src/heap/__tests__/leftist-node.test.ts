import { describe, it, expect } from "vitest";
import { cloneTree, countNodes, createNode, npl } from "../leftist-node.js";
import { build } from "./helpers.js";

describe("leftist nodes", () => {
  it("creates leaves with npl 1 and treats null as 0", () => {
    expect(createNode("a")).toEqual({ value: "a", left: null, right: null, npl: 1 });
    expect(npl(null)).toBe(0);
  });

  it("clones structure and npl without sharing nodes", () => {
    const tree = build([7, 3, 5]).tree;
    const copy = cloneTree(tree, (v) => v * 10);

    expect(copy).toEqual({
      value: 70,
      npl: 2,
      left: { value: 30, npl: 1, left: null, right: null },
      right: { value: 50, npl: 1, left: null, right: null },
    });
    expect(copy?.left).not.toBe(tree?.left);
  });

  it("walks long left spines without exhausting the stack", () => {
    // ascending pushes into a max-heap chain every node down the left side
    const heap = build(Array.from({ length: 50_000 }, (_, i) => i));
    const copy = cloneTree(heap.tree, (v) => v);

    expect(countNodes(heap.tree)).toBe(50_000);
    expect(countNodes(copy)).toBe(50_000);
    expect(copy?.value).toBe(49_999);
    expect(copy?.right).toBeNull();
  });

  it("counts nothing for an empty tree", () => {
    expect(countNodes(null)).toBe(0);
    expect(cloneTree(null, (v) => v)).toBeNull();
  });
});
