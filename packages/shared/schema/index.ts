export * from "./catalog";
export * from "./engagement";
export * from "./polls";
export * from "./events";
