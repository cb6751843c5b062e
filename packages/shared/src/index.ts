// @newsdesk/shared — item model, configuration, backends, and relevance filter
export * from "./types.js";
export * from "./errors.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./sources.js";
export * from "./providers/index.js";
export * from "./backends/index.js";
export * from "./relevance/index.js";
