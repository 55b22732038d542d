export * from "./types";
export * from "./live-overlay";
export * from "./alternative-route";
export * from "./templates";
export * from "./narrative";
export * from "./synthesizer";
