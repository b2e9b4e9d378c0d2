export * from "./client.js";
export * from "./normalize.js";
export * from "./repository.js";
export * from "./schema.js";
export type * from "./types.js";
