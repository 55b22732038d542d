export * from "./types";
export * from "./geo";
export * from "./checkpoints";
export * from "./state-machine";
export * from "./session-store";
