export { buildServer, toAuthAction } from "./server.js";
export type { ServerOptions } from "./server.js";
