export * from "./CollectionEngine";
export * from "./CollectionEngineDefault";
