export { createResearchPlugin } from "./plugin.js";
export type { ResearchPluginConfig, ResearchPluginInstance } from "./types.js";
export { configureOpenAPI } from "./lib/configure-openapi.js";
export type { OpenAPIConfig } from "./lib/configure-openapi.js";
export { createModel } from "./lib/create-model.js";
export { loadConfig } from "./config.js";
export type { ServerConfig } from "./config.js";
export { chatRequestSchema } from "./routes/chat/chat.routes.js";
