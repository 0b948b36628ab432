/**
 * Relationship Module
 *
 * Directed object-pair relationships and the object catalog they reference.
 */

// Models
export * from "./models/relationship-models.js";

// Interfaces
export * from "./interfaces/IRelationshipStore.js";

// Implementation
export * from "./impl/RelationshipStore.js";
