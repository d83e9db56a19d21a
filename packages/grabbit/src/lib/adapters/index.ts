export { createNodeFetchClient } from "./node-fetch-http.js";
export type { NodeFetchClientOptions } from "./node-fetch-http.js";
