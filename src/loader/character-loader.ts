import type { RecordSource, RelationKind, SourcedRecord } from '../types/index.js';
import { Character } from '../model/character.js';
import { getLogger } from '../utils/logger.js';
import {
    DanglingReferenceWarning,
    DuplicateIdError,
    MultiplePlayersError,
    NoPlayerDesignatedError,
    RecordParseError,
    ValidationError,
    type LoadIssue,
} from './issues.js';

/**
 * Everything a load run produced. The registry owns the characters;
 * consumers treat it as read-only once returned.
 */
export interface LoadResult {
    registry: Map<string, Character>;
    playerId: string | null;
    /** Chronological, human-readable trace of the run */
    log: string[];
    /** Issues classified as failures, in the order they were recorded */
    errors: LoadIssue[];
    /** Unresolved relationship ids (also in `errors` when escalated) */
    warnings: DanglingReferenceWarning[];
}

export interface CharacterLoaderOptions {
    /** Record dangling relationship ids in `errors` as well as the log */
    escalateDanglingReferences?: boolean;
}

/**
 * Turns a batch of raw records into a validated, linked character registry.
 *
 * Two phases: every record is parsed and registered first, then relationship
 * ids are resolved against the complete registry. Per-record and
 * per-relationship problems are accumulated, never thrown.
 */
export class CharacterLoader {
    private readonly escalateDanglingReferences: boolean;

    private registry = new Map<string, Character>();
    private sources = new Map<string, string>();
    private playerId: string | null = null;
    private log: string[] = [];
    private errors: LoadIssue[] = [];
    private warnings: DanglingReferenceWarning[] = [];

    constructor(options: CharacterLoaderOptions = {}) {
        this.escalateDanglingReferences = options.escalateDanglingReferences ?? false;
    }

    /**
     * Load untagged records; each is identified by its position, `record[i]`.
     */
    load(records: readonly unknown[]): LoadResult {
        return this.loadSourced(records.map((data, i) => ({ source: `record[${i}]`, data })));
    }

    /**
     * Load records already tagged with a source identifier (e.g. a file name).
     */
    loadSourced(records: readonly SourcedRecord[]): LoadResult {
        this.reset();
        this.addLog(`CharacterLoader: Processing ${records.length} character records.`);

        // Phase 1a: construct, keeping construction order for duplicate and player checks
        const constructed: Array<{ character: Character; source: string }> = [];
        for (const record of records) {
            if ('error' in record) {
                this.addError(new RecordParseError(record.source, record.error));
                continue;
            }
            try {
                constructed.push({ character: Character.fromRecord(record.data), source: record.source });
            } catch (error) {
                if (!(error instanceof ValidationError)) throw error;
                this.addError(error.withSource(record.source));
            }
        }

        // Phase 1b: register, first occurrence wins, last player wins
        for (const { character, source } of constructed) {
            const firstSource = this.sources.get(character.id);
            if (firstSource !== undefined) {
                this.addError(new DuplicateIdError(character.id, source, firstSource));
                continue;
            }

            this.registry.set(character.id, character);
            this.sources.set(character.id, source);

            if (character.isPlayer) {
                if (this.playerId !== null) {
                    this.addError(new MultiplePlayersError(this.playerId, character.id, source));
                }
                this.playerId = character.id;
            }
        }

        this.addLog(
            `CharacterLoader: Successfully parsed and preliminarily processed ${this.registry.size} unique characters.`
        );

        if (this.registry.size > 0 && this.playerId === null) {
            this.addError(new NoPlayerDesignatedError());
        }

        // Phase 2: resolve ids against the complete registry
        this.linkRelationships();

        if (this.errors.length > 0) {
            this.addLog(`CharacterLoader: Character loading and linking completed with ${this.errors.length} issues.`);
        } else {
            this.addLog('CharacterLoader: All characters loaded and linked successfully.');
        }

        getLogger().debug(
            { characters: this.registry.size, playerId: this.playerId, errors: this.errors.length, warnings: this.warnings.length },
            'Character load complete'
        );

        return {
            registry: this.registry,
            playerId: this.playerId,
            log: this.log,
            errors: this.errors,
            warnings: this.warnings,
        };
    }

    // ─── Internal helpers ─────────────────────────────────

    /**
     * Fresh containers on every run, so a returned result is never
     * touched by a later run.
     */
    private reset(): void {
        this.registry = new Map();
        this.sources = new Map();
        this.playerId = null;
        this.log = [];
        this.errors = [];
        this.warnings = [];
    }

    private addLog(message: string): void {
        this.log.push(message);
    }

    private addError(issue: LoadIssue): void {
        this.errors.push(issue);
        this.addLog(`ERROR: ${issue.message}`);
        getLogger().debug({ kind: issue.kind, source: issue.source }, issue.message);
    }

    private addWarning(warning: DanglingReferenceWarning): void {
        this.warnings.push(warning);
        if (this.escalateDanglingReferences) {
            this.addError(warning);
        } else {
            this.addLog(`  WARN: ${warning.message}`);
        }
    }

    /**
     * Populate each character's link slots from its raw relationship ids.
     * Reads the whole registry, writes only the current character's slots.
     */
    private linkRelationships(): void {
        this.addLog('CharacterLoader: Linking character relationships...');
        if (this.registry.size === 0) {
            this.addLog('  No characters to link (character registry is empty).');
            return;
        }

        for (const character of this.registry.values()) {
            character.spouse = null;
            const spouseId = character.spouseId();
            if (spouseId !== null) {
                const spouse = this.registry.get(spouseId);
                if (spouse) {
                    character.spouse = spouse;
                } else {
                    this.addWarning(new DanglingReferenceWarning(character.id, 'spouse', spouseId));
                }
            }

            character.parents = this.resolveAll(character, 'parent', character.parentIds());
            character.children = this.resolveAll(character, 'child', character.childrenIds());
            character.siblings = this.resolveAll(character, 'sibling', character.siblingIds());
        }

        this.addLog('CharacterLoader: Character relationship linking attempt complete.');
    }

    private resolveAll(owner: Character, relation: RelationKind, ids: readonly string[]): Character[] {
        const linked: Character[] = [];
        for (const id of ids) {
            const target = this.registry.get(id);
            if (target) {
                linked.push(target);
            } else {
                this.addWarning(new DanglingReferenceWarning(owner.id, relation, id));
            }
        }
        return linked;
    }
}

/**
 * Read every record from a source and run them through a loader.
 * Throws RecordSourceError when the source cannot be consulted at all.
 */
export function loadFromSource(source: RecordSource, loader = new CharacterLoader()): LoadResult {
    const records = source.read();
    const result = loader.loadSourced(records);
    const header = [`CharacterLoader: Read ${records.length} records from ${source.name}.`];
    if (records.length === 0) {
        header.push(`WARN: No character records found in ${source.name}.`);
    }
    result.log.unshift(...header);
    return result;
}
