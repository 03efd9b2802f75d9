import type { RelationKind } from '../types/index.js';

/**
 * Issue classification for a load run.
 */
export type IssueKind =
    | 'parse'
    | 'validation'
    | 'duplicate-id'
    | 'multiple-players'
    | 'no-player'
    | 'dangling-reference';

export type IssueSeverity = 'error' | 'warning';

/**
 * Base class for everything a load run records instead of throwing.
 * `source` is the record identifier (file name or `record[i]`), when one applies.
 */
export abstract class LoadIssue extends Error {
    abstract readonly kind: IssueKind;
    readonly severity: IssueSeverity = 'error';

    constructor(
        message: string,
        public readonly source: string | null = null
    ) {
        super(message);
        this.name = 'LoadIssue';
    }
}

/**
 * A source handed over a record it could not parse.
 */
export class RecordParseError extends LoadIssue {
    readonly kind = 'parse';

    constructor(source: string, public readonly reason: Error) {
        super(`Failed to parse character record '${source}': ${reason.message}`, source);
        this.name = 'RecordParseError';
    }
}

/**
 * A record is missing a required field, or a field has the wrong shape.
 * Thrown by Character.fromRecord; the loader tags it with the record's source.
 */
export class ValidationError extends LoadIssue {
    readonly kind = 'validation';

    constructor(
        message: string,
        public readonly field: string,
        source: string | null = null
    ) {
        super(message, source);
        this.name = 'ValidationError';
    }

    /** Copy of this error attributed to a record source. */
    withSource(source: string): ValidationError {
        return new ValidationError(`Invalid character record '${source}': ${this.message}`, this.field, source);
    }
}

export class DuplicateIdError extends LoadIssue {
    readonly kind = 'duplicate-id';

    constructor(
        public readonly id: string,
        source: string,
        public readonly firstSource: string
    ) {
        super(
            `Duplicate character ID '${id}' in '${source}' (first defined in '${firstSource}'). Original kept, duplicate ignored.`,
            source
        );
        this.name = 'DuplicateIdError';
    }
}

export class MultiplePlayersError extends LoadIssue {
    readonly kind = 'multiple-players';

    constructor(
        public readonly previousId: string,
        public readonly nextId: string,
        source: string
    ) {
        super(
            `Multiple player characters defined! Old: ${previousId}, New: ${nextId}. Using the latter: ${nextId}.`,
            source
        );
        this.name = 'MultiplePlayersError';
    }
}

export class NoPlayerDesignatedError extends LoadIssue {
    readonly kind = 'no-player';

    constructor() {
        super('No player character (is_player: true) was designated among the loaded characters.');
        this.name = 'NoPlayerDesignatedError';
    }
}

/**
 * A relationship id did not resolve to a registered character.
 * Informational by default; never blocks linking of anything else.
 */
export class DanglingReferenceWarning extends LoadIssue {
    readonly kind = 'dangling-reference';
    override readonly severity = 'warning';

    constructor(
        public readonly ownerId: string,
        public readonly relation: RelationKind,
        public readonly missingId: string
    ) {
        super(`For character '${ownerId}', ${relation} ID '${missingId}' not found in loaded characters.`);
        this.name = 'DanglingReferenceWarning';
    }
}

/**
 * The record source itself could not be consulted (e.g. missing directory).
 * The only failure that stops a load from producing a result.
 */
export class RecordSourceError extends Error {
    constructor(
        message: string,
        public readonly location: string
    ) {
        super(message);
        this.name = 'RecordSourceError';
    }
}
