export * from "./Hasher";
export * from "./HasherSha256";
