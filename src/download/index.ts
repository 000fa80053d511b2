export * from "./batch";
export * from "./fetcher";
export * from "./target";
