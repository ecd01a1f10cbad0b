export * from "./domain";
export * from "./vocabulary";
