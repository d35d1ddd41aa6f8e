export * from "./types";
export * from "./errors";
export * from "./random";
export * from "./math";
export * from "./config";
export * from "./attributes";
export * from "./backgrounds";
export * from "./skills";
export * from "./foci";
export * from "./powers";
export * from "./equipment";
export * from "./combat";
export * from "./synthesize";
