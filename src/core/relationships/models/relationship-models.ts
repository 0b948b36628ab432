/**
 * Relationship Models
 *
 * Objects and the directed relationships between them that back the cells of
 * the Nested Object Matrix.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { IsoTimestampSchema } from "../../clock.js";

// =============================================================================
// Enumerations
// =============================================================================

export const CardinalitySchema = z.enum(["1:1", "1:N", "N:M"]);

export type Cardinality = z.infer<typeof CardinalitySchema>;

export const StrengthSchema = z.enum(["weak", "normal", "strong"]);

export type Strength = z.infer<typeof StrengthSchema>;

// =============================================================================
// Project Objects
// =============================================================================

/**
 * A named domain object. Owned by the object catalog, read by the core.
 */
export const ProjectObjectSchema = z.object({
  id: z.string().min(1),
  projectId: z.string().min(1),
  name: z.string().min(1),
  definition: z.string().nullable().default(null),
  synonyms: z.array(z.string()).default([]),
});

export type ProjectObject = z.infer<typeof ProjectObjectSchema>;

// =============================================================================
// Relationship Record
// =============================================================================

export const RelationshipSchema = z.object({
  id: z.string().min(1),
  projectId: z.string().min(1),
  sourceObjectId: z.string().min(1),
  targetObjectId: z.string().min(1),
  cardinality: CardinalitySchema,
  forwardLabel: z.string().max(255).nullable(), // source -> target
  reverseLabel: z.string().max(255).nullable(), // target -> source
  isBidirectional: z.boolean(),
  description: z.string().max(1000).nullable(),
  strength: StrengthSchema,
  createdAt: IsoTimestampSchema,
  updatedAt: IsoTimestampSchema,
  createdBy: z.string().min(1),
  updatedBy: z.string().min(1),
});

export type Relationship = z.infer<typeof RelationshipSchema>;

// =============================================================================
// Inputs
// =============================================================================

export const RelationshipCreateInputSchema = z.object({
  sourceObjectId: z.string().min(1),
  targetObjectId: z.string().min(1),
  cardinality: CardinalitySchema.default("1:N"),
  forwardLabel: z.string().max(255).nullable().optional(),
  reverseLabel: z.string().max(255).nullable().optional(),
  isBidirectional: z.boolean().default(false),
  description: z.string().max(1000).nullable().optional(),
  strength: StrengthSchema.default("normal"),
});

export type RelationshipCreateInput = z.input<typeof RelationshipCreateInputSchema>;
export type ParsedRelationshipCreate = z.output<typeof RelationshipCreateInputSchema>;

/**
 * Partial update. Keys left out keep their stored value; `null` clears a
 * label or the description.
 */
export const RelationshipUpdateInputSchema = z.object({
  cardinality: CardinalitySchema.optional(),
  forwardLabel: z.string().max(255).nullable().optional(),
  reverseLabel: z.string().max(255).nullable().optional(),
  isBidirectional: z.boolean().optional(),
  description: z.string().max(1000).nullable().optional(),
  strength: StrengthSchema.optional(),
});

export type RelationshipUpdateInput = z.input<typeof RelationshipUpdateInputSchema>;

export type RelationshipPatch = Partial<
  Pick<
    Relationship,
    | "cardinality"
    | "forwardLabel"
    | "reverseLabel"
    | "isBidirectional"
    | "description"
    | "strength"
    | "updatedAt"
    | "updatedBy"
  >
>;

// =============================================================================
// Search
// =============================================================================

export const RelationshipSortFieldSchema = z.enum(["createdAt", "updatedAt", "cardinality", "strength"]);

export type RelationshipSortField = z.infer<typeof RelationshipSortFieldSchema>;

export const RelationshipSearchRequestSchema = z.object({
  sourceObjectId: z.string().min(1).optional(),
  targetObjectId: z.string().min(1).optional(),
  cardinality: CardinalitySchema.optional(),
  strength: StrengthSchema.optional(),
  isBidirectional: z.boolean().optional(),
  sortBy: RelationshipSortFieldSchema.default("createdAt"),
  sortOrder: z.string().toLowerCase().pipe(z.enum(["asc", "desc"])).default("desc"),
  limit: z.number().int().min(1).max(100).default(50),
  offset: z.number().int().min(0).default(0),
});

export type RelationshipSearchRequest = z.input<typeof RelationshipSearchRequestSchema>;
export type ParsedRelationshipSearch = z.output<typeof RelationshipSearchRequestSchema>;

export type RelationshipFilter = Pick<
  ParsedRelationshipSearch,
  "sourceObjectId" | "targetObjectId" | "cardinality" | "strength" | "isBidirectional"
>;

export interface RelationshipPage {
  relationships: Relationship[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createRelationshipRecord(
  projectId: string,
  input: ParsedRelationshipCreate,
  actorId: string,
  now: Date
): Relationship {
  const timestamp = now.toISOString();
  return {
    id: randomUUID(),
    projectId,
    sourceObjectId: input.sourceObjectId,
    targetObjectId: input.targetObjectId,
    cardinality: input.cardinality,
    forwardLabel: input.forwardLabel ?? null,
    reverseLabel: input.reverseLabel ?? null,
    isBidirectional: input.isBidirectional,
    description: input.description ?? null,
    strength: input.strength,
    createdAt: timestamp,
    updatedAt: timestamp,
    createdBy: actorId,
    updatedBy: actorId,
  };
}

export function createProjectObject(
  projectId: string,
  name: string,
  options: { id?: string; definition?: string | null; synonyms?: string[] } = {}
): ProjectObject {
  return {
    id: options.id ?? randomUUID(),
    projectId,
    name,
    definition: options.definition ?? null,
    synonyms: options.synonyms ?? [],
  };
}

/**
 * Key identifying an ordered (source, target) pair
 */
export function pairKey(sourceObjectId: string, targetObjectId: string): string {
  return JSON.stringify([sourceObjectId, targetObjectId]);
}
