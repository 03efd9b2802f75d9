/**
 * Relationship ids exactly as a character record declares them.
 * Resolved into object links by the loader once every character exists.
 */
export interface RelationshipIds {
    spouse_id?: string;
    parent_ids: readonly string[];
    children_ids: readonly string[];
    sibling_ids: readonly string[];
}

/** Relationship slots a character can link to. */
export type RelationKind = 'spouse' | 'parent' | 'child' | 'sibling';

/**
 * A raw record tagged with where it came from (file name, or `record[i]`).
 * Sources that fail to parse a record hand over the error instead of data.
 */
export type SourcedRecord =
    | { source: string; data: unknown }
    | { source: string; error: Error };

/** Fields every character record must carry, in the order they are checked. */
export const REQUIRED_FIELDS = ['id', 'name', 'age', 'gender', 'bio'] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];
