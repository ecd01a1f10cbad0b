import { CodeTable, MAX_CODE_LENGTH } from "./code-table";
import { HuffmanError } from "./errors";
import type { HuffmanNode, IHuffmanTree } from "./huffman-tree.domain";

interface Frame {
  node: HuffmanNode;
  bits: bigint;
  length: number;
}

/**
 * Walks the tree with an explicit stack, recording root-to-leaf paths
 * (left = 0, right = 1). Releases the tree; it cannot be walked again.
 *
 * A lone leaf at the root would get an empty path, so it is given the 1-bit
 * code `0` instead.
 */
export function assignCodes(tree: IHuffmanTree | null): CodeTable {
  const table = new CodeTable();
  if (tree === null) return table;

  const root = tree.release();
  if (root.kind === "leaf") {
    table.set(root.symbol, { bits: 0n, length: 1 });
    return table;
  }

  const stack: Frame[] = [{ node: root, bits: 0n, length: 0 }];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame === undefined) break;
    const { node, bits, length } = frame;

    if (node.kind === "leaf") {
      table.set(node.symbol, { bits, length });
      continue;
    }

    if (length + 1 > MAX_CODE_LENGTH) {
      throw new HuffmanError(
        "CODE_TOO_LONG",
        `Huffman tree is deeper than ${MAX_CODE_LENGTH} levels`
      );
    }

    // right first, so the left subtree is visited first
    stack.push({ node: node.right, bits: (bits << 1n) | 1n, length: length + 1 });
    stack.push({ node: node.left, bits: bits << 1n, length: length + 1 });
  }

  return table;
}
