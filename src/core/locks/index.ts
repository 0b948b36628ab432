/**
 * Cell Lock Module
 */

export * from "./models/lock-models.js";
export * from "./interfaces/ILockManager.js";
export * from "./impl/LockManager.js";
