/**
 * Storage Module
 *
 * Table abstraction the collaboration components persist through, plus the
 * in-memory adapter and the collaboration table layout.
 */

export * from "./interfaces/IStorageAdapter.js";
export * from "./impl/MemoryStorageAdapter.js";
export * from "./tables.js";
