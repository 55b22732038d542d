export * from "./types";
export * from "./embedder";
export * from "./passage-index";
export * from "./corpus";
