export * from "./errors";
export * from "./symbols";
export * from "./frequency-table";
export * from "./priority-queue.domain";
export * from "./priority-queue";
export * from "./huffman-tree.domain";
export * from "./huffman-tree";
export * from "./code-table.domain";
export * from "./code-table";
export * from "./code-assigner";
export * from "./encoder.domain";
export * from "./encoder";
export * from "./analysis.domain";
export * from "./analysis";
export * from "./case-folding";
