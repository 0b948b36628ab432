/**
 * Collaboration Module
 *
 * Facade, background sweeper and the wiring that builds them from a storage
 * adapter.
 */

// Interfaces
export * from "./interfaces/ICollaborationFacade.js";

// Implementation
export * from "./impl/CollaborationFacade.js";
export * from "./impl/CollaborationSweeper.js";
export * from "./impl/factory.js";
