export type { ConsoleTransportOptions } from "./console.js";
export { ConsoleTransport } from "./console.js";
export type { FileTransportOptions } from "./file.js";
export { FileTransport } from "./file.js";
export type { JsonTransportOptions } from "./json.js";
export { JsonTransport } from "./json.js";
