/**
 * Relationship Definitions
 *
 * Resources expose named relationships to other resources:
 *   - hasOne:  to-one (e.g., Post → author)
 *   - hasMany: to-many (e.g., Post → comments)
 *
 * Each relationship gets its own related and "relationships/" endpoints
 * and its own row in the role table.
 */

/** Cardinality of a relationship */
export type RelationshipType = "hasOne" | "hasMany";

/** Identifies one relationship of a resource in routes and role lookups */
export interface RelationshipRef {
  /** Cardinality */
  type: RelationshipType;

  /** Dasherized relationship name as it appears in URLs (e.g., "co-author") */
  name: string;
}
