export interface HuffmanLeaf {
  readonly kind: "leaf";
  readonly symbol: number;
  readonly weight: number;
}

/**
 * Internal node. Owns both children exclusively; no node is ever reachable
 * from two parents.
 */
export interface HuffmanBranch {
  readonly kind: "branch";
  readonly weight: number;
  readonly left: HuffmanNode;
  readonly right: HuffmanNode;
}

export type HuffmanNode = HuffmanLeaf | HuffmanBranch;

export type AlphabetCondition = "empty" | "degenerate" | "normal";

export interface IHuffmanTree {
  readonly leafCount: number;
  readonly branchCount: number;
  readonly weight: number;
  readonly released: boolean;

  /**
   * Hands the root over to the caller and detaches it from the tree.
   * A tree can be released exactly once.
   */
  release(): HuffmanNode;
}
