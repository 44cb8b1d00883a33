export * from "./RunReport";
