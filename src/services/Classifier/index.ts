export * from "./Classifier";
