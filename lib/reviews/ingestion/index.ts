export * from "./pipeline";
export * from "./context";
