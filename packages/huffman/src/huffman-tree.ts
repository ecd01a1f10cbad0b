import { HuffmanError } from "./errors";
import type { FrequencyTable } from "./frequency-table";
import type {
  AlphabetCondition,
  HuffmanBranch,
  HuffmanLeaf,
  HuffmanNode,
  IHuffmanTree,
} from "./huffman-tree.domain";
import { PriorityQueue } from "./priority-queue";
import { ALPHABET_SIZE } from "./symbols";

export class HuffmanTree implements IHuffmanTree {
  private _root: HuffmanNode | null;
  readonly leafCount: number;
  readonly branchCount: number;
  readonly weight: number;

  constructor(root: HuffmanNode, leafCount: number, branchCount: number) {
    this._root = root;
    this.leafCount = leafCount;
    this.branchCount = branchCount;
    this.weight = root.weight;
  }

  get released(): boolean {
    return this._root === null;
  }

  release(): HuffmanNode {
    const root = this._root;
    if (root === null) {
      throw new HuffmanError("TREE_RELEASED", "Huffman tree already released");
    }
    this._root = null;
    return root;
  }
}

export function classifyAlphabet(frequencies: FrequencyTable): AlphabetCondition {
  const distinct = frequencies.distinct;
  if (distinct === 0) return "empty";
  if (distinct === 1) return "degenerate";
  return "normal";
}

/**
 * Merges the two lightest pending nodes until one remains. Leaves enter the
 * queue in ascending symbol order and the first node popped becomes the left
 * child, so equal distributions always produce the same tree.
 *
 * @returns null when no symbol has a nonzero frequency
 */
export function buildHuffmanTree(
  frequencies: FrequencyTable
): HuffmanTree | null {
  const queue = new PriorityQueue<HuffmanNode>({
    weigh: (node) => node.weight,
    capacity: ALPHABET_SIZE * 2,
  });

  let leafCount = 0;
  for (const symbol of frequencies.symbols()) {
    const leaf: HuffmanLeaf = {
      kind: "leaf",
      symbol,
      weight: frequencies.get(symbol),
    };
    queue.push(leaf);
    leafCount++;
  }

  let branchCount = 0;
  while (queue.size > 1) {
    const left = queue.pop();
    const right = queue.pop();
    if (left === undefined || right === undefined) break;

    const branch: HuffmanBranch = {
      kind: "branch",
      weight: left.weight + right.weight,
      left,
      right,
    };
    queue.push(branch);
    branchCount++;
  }

  const root = queue.pop();
  if (root === undefined) return null;
  return new HuffmanTree(root, leafCount, branchCount);
}
