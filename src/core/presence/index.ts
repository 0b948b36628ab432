/**
 * Presence Module
 */

export * from "./models/presence-models.js";
export * from "./interfaces/IPresenceTracker.js";
export * from "./impl/PresenceTracker.js";
