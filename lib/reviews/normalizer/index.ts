export * from "./cuisine-vocabulary";
export * from "./normalize";
