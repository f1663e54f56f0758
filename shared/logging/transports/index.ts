/**
 * Transport Exports
 */

export { ConsoleTransport, type ConsoleTransportOptions } from "./console.js";
export { MemoryTransport, type MemoryTransportOptions } from "./memory.js";
