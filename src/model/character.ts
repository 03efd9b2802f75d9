import { z } from 'zod';
import { REQUIRED_FIELDS, type RelationshipIds } from '../types/index.js';
import { ValidationError } from '../loader/issues.js';

const stringList = z
    .array(z.string())
    .nullish()
    .transform((v) => v ?? []);

const relationshipIdsSchema = z
    .object({
        spouse_id: z.string().nullish(),
        parent_ids: stringList,
        children_ids: stringList,
        sibling_ids: stringList,
    })
    .nullish();

/**
 * Shape of one character record. Presence of the required fields is checked
 * before this runs so the first missing one can be reported by name.
 */
const characterRecordSchema = z.object({
    id: z.string().min(1, 'must be a non-empty string'),
    name: z.string(),
    age: z.number().int(),
    gender: z.string(),
    bio: z
        .string()
        .nullable()
        .transform((v) => v ?? ''),
    is_player: z
        .boolean()
        .nullish()
        .transform((v) => v ?? false),
    traits: stringList,
    skills: stringList,
    assets: stringList,
});

type CharacterRecord = z.output<typeof characterRecordSchema>;
type RelationshipIdsRecord = z.output<typeof relationshipIdsSchema>;

/** Hand-written files use `relationships`; `relationship_ids` wins when both are set. */
const RELATIONSHIP_KEYS = ['relationship_ids', 'relationships'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalidField(error: z.ZodError, prefix: readonly string[]): ValidationError {
    const issue = error.issues[0];
    const field = [...prefix, ...(issue?.path ?? [])].join('.') || '(record)';
    return new ValidationError(`Invalid field '${field}': ${issue?.message ?? 'invalid value'}`, field);
}

/**
 * One character: immutable base attributes, the relationship ids it was
 * declared with, and link slots the loader fills once every character exists.
 */
export class Character {
    readonly id: string;
    readonly name: string;
    readonly age: number;
    readonly gender: string;
    readonly bio: string;
    readonly isPlayer: boolean;
    readonly traits: readonly string[];
    readonly skills: readonly string[];
    readonly assets: readonly string[];
    readonly relationshipIds: Readonly<RelationshipIds>;

    // Populated by CharacterLoader; lookups into the registry, never copies.
    spouse: Character | null = null;
    parents: Character[] = [];
    children: Character[] = [];
    siblings: Character[] = [];

    private constructor(record: CharacterRecord, rel: RelationshipIdsRecord) {
        this.id = record.id;
        this.name = record.name;
        this.age = record.age;
        this.gender = record.gender;
        this.bio = record.bio;
        this.isPlayer = record.is_player;
        this.traits = Object.freeze([...record.traits]);
        this.skills = Object.freeze([...record.skills]);
        this.assets = Object.freeze([...record.assets]);

        const ids: RelationshipIds = {
            parent_ids: Object.freeze([...(rel?.parent_ids ?? [])]),
            children_ids: Object.freeze([...(rel?.children_ids ?? [])]),
            sibling_ids: Object.freeze([...(rel?.sibling_ids ?? [])]),
        };
        if (rel?.spouse_id) {
            ids.spouse_id = rel.spouse_id;
        }
        this.relationshipIds = Object.freeze(ids);
    }

    /**
     * Build a character from a raw record (a string-keyed mapping).
     * Does no cross-character work: relationship ids stay unresolved.
     *
     * @throws ValidationError naming the first missing or invalid field
     */
    static fromRecord(record: unknown): Character {
        if (!isRecord(record)) {
            throw new ValidationError('Character record must be a mapping of fields', '(record)');
        }

        for (const field of REQUIRED_FIELDS) {
            if (record[field] === undefined) {
                throw new ValidationError(`Missing required field '${field}'`, field);
            }
        }

        const parsed = characterRecordSchema.safeParse(record);
        if (!parsed.success) {
            throw invalidField(parsed.error, []);
        }

        // Only the key that is actually used gets validated
        const relKey = RELATIONSHIP_KEYS.find((key) => record[key] != null) ?? 'relationship_ids';
        const rel = relationshipIdsSchema.safeParse(record[relKey]);
        if (!rel.success) {
            throw invalidField(rel.error, [relKey]);
        }

        return new Character(parsed.data, rel.data);
    }

    // ─── Relationship id accessors ─────────────────────────

    spouseId(): string | null {
        return this.relationshipIds.spouse_id ?? null;
    }

    parentIds(): readonly string[] {
        return this.relationshipIds.parent_ids;
    }

    childrenIds(): readonly string[] {
        return this.relationshipIds.children_ids;
    }

    siblingIds(): readonly string[] {
        return this.relationshipIds.sibling_ids;
    }

    // ─── Display ───────────────────────────────────────────

    /** One-line summary, e.g. "Jane (30F)". */
    shortDescription(): string {
        return `${this.name} (${this.age}${this.gender})`;
    }

    fullBio(): string {
        const lines = [
            `Name: ${this.name}`,
            `ID: ${this.id}`,
            `Age: ${this.age}`,
            `Gender: ${this.gender}`,
            'Bio:',
            `  ${this.bio ? this.bio.replace(/\n/g, '\n  ') : 'N/A'}`,
        ];
        if (this.traits.length > 0) {
            lines.push(`Traits: ${this.traits.join(', ')}`);
        }
        if (this.skills.length > 0) {
            lines.push(`Notable Skills: ${this.skills.join(', ')}`);
        }
        if (this.assets.length > 0) {
            lines.push(`Assets: ${this.assets.join(', ')}`);
        }
        return lines.join('\n');
    }

    /**
     * Family block built from the resolved links, so it only shows
     * relatives that were actually loaded.
     */
    familyInfo(): string {
        const names = (chars: Character[]) => chars.map((c) => c.name).join(', ');
        const lines = ['Family Information:'];

        lines.push(this.spouse ? `  Spouse: ${this.spouse.name} (ID: ${this.spouse.id})` : '  Spouse: None');
        lines.push(`  Parents: ${this.parents.length > 0 ? names(this.parents) : 'Unknown'}`);
        lines.push(`  Children: ${this.children.length > 0 ? names(this.children) : 'None'}`);
        if (this.siblings.length > 0) {
            lines.push(`  Siblings: ${names(this.siblings)}`);
        }

        return lines.join('\n');
    }

    toString(): string {
        return `<Character id='${this.id}' name='${this.name}' age=${this.age}>`;
    }
}
