export * from "./types/game";
export * from "./types/ui";
