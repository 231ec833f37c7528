export * from "./deny-list.js";
export * from "./cli.js";
