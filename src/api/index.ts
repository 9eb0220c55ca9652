export { createApp, chatRequestSchema } from "./server.js";
export type { AppOptions } from "./server.js";
