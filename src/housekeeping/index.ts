export * from "./prune";
