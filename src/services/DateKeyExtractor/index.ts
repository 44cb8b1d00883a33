export * from "./DateKeyExtractor";
export * from "./DateKeyExtractorDefault";
export * from "./DocumentDateKeySource";
export * from "./ExifDateKeySource";
