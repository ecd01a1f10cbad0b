export * from "./table";
export * from "./code-table";
export * from "./descriptions";
export * from "./encoding";
export * from "./comparison";
export * from "./json";
export * from "./report";
