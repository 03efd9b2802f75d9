import { describe, it, expect } from 'vitest';
import { CharacterLoader, loadFromSource } from '../loader/character-loader.js';
import {
    DanglingReferenceWarning,
    DuplicateIdError,
    MultiplePlayersError,
    NoPlayerDesignatedError,
    RecordParseError,
    ValidationError,
} from '../loader/issues.js';
import type { RecordSource, SourcedRecord } from '../types/index.js';

// Helper: a valid character record
function makeRecord(id: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        id,
        name: `Name ${id}`,
        age: 40,
        gender: 'M',
        bio: `Bio of ${id}`,
        ...extra,
    };
}

describe('CharacterLoader', () => {
    describe('end-to-end', () => {
        it('should load a single player character without errors', () => {
            const result = new CharacterLoader().load([
                { id: 'P1', name: 'Jane', age: 30, gender: 'F', bio: '...', is_player: true },
            ]);

            expect([...result.registry.keys()]).toEqual(['P1']);
            expect(result.playerId).toBe('P1');
            expect(result.errors).toEqual([]);
            expect(result.log).toEqual([
                'CharacterLoader: Processing 1 character records.',
                'CharacterLoader: Successfully parsed and preliminarily processed 1 unique characters.',
                'CharacterLoader: Linking character relationships...',
                'CharacterLoader: Character relationship linking attempt complete.',
                'CharacterLoader: All characters loaded and linked successfully.',
            ]);
        });

        it('should link mutual spouses symmetrically', () => {
            const result = new CharacterLoader().load([
                makeRecord('A', { is_player: true, relationship_ids: { spouse_id: 'B' } }),
                makeRecord('B', { relationship_ids: { spouse_id: 'A' } }),
            ]);

            const a = result.registry.get('A');
            const b = result.registry.get('B');
            expect(a?.spouse).toBe(b);
            expect(b?.spouse).toBe(a);
            expect(result.errors).toEqual([]);
            expect(result.warnings).toEqual([]);
        });

        it('should return an empty result for no records', () => {
            const result = new CharacterLoader().load([]);

            expect(result.registry.size).toBe(0);
            expect(result.playerId).toBeNull();
            expect(result.errors).toEqual([]);
            expect(result.log).toContain('  No characters to link (character registry is empty).');
        });
    });

    describe('reset between runs', () => {
        it('should produce identical results for identical input', () => {
            const loader = new CharacterLoader();
            const input = [
                makeRecord('A', { is_player: true }),
                makeRecord('A'),
                makeRecord('B', { relationship_ids: { parent_ids: ['GHOST'] } }),
            ];

            const first = loader.load(input);
            const second = loader.load(input);

            expect([...second.registry.keys()]).toEqual([...first.registry.keys()]);
            expect(second.playerId).toBe(first.playerId);
            expect(second.errors.map((e) => e.message)).toEqual(first.errors.map((e) => e.message));
            expect(second.log).toEqual(first.log);
        });

        it('should not touch a previous result', () => {
            const loader = new CharacterLoader();
            const first = loader.load([makeRecord('A', { is_player: true })]);
            const firstLogLength = first.log.length;

            const second = loader.load([makeRecord('Z')]);

            expect(first.registry.has('A')).toBe(true);
            expect(first.registry.has('Z')).toBe(false);
            expect(first.playerId).toBe('A');
            expect(first.errors).toEqual([]);
            expect(first.log).toHaveLength(firstLogLength);
            expect(second.registry.get('A')).toBeUndefined();
            expect(second.playerId).toBeNull();
        });
    });

    describe('record validation', () => {
        it('should record a validation error and keep going', () => {
            const result = new CharacterLoader().load([
                { id: 'BROKEN', name: 'No Age' },
                makeRecord('A', { is_player: true }),
            ]);

            expect([...result.registry.keys()]).toEqual(['A']);
            expect(result.errors).toHaveLength(1);

            const error = result.errors[0];
            expect(error).toBeInstanceOf(ValidationError);
            expect(error?.source).toBe('record[0]');
            expect(error?.message).toBe("Invalid character record 'record[0]': Missing required field 'age'");
            expect(result.log).toContain(`ERROR: ${error?.message}`);
        });

        it('should not flag a missing player when every record failed', () => {
            const result = new CharacterLoader().load([{ id: 'X' }, 'not a record']);

            expect(result.registry.size).toBe(0);
            expect(result.errors.map((e) => e.kind)).toEqual(['validation', 'validation']);
        });

        it('should record parse failures handed over by a source', () => {
            const result = new CharacterLoader().loadSourced([
                { source: 'broken.yaml', error: new Error('bad indentation') },
                { source: 'a.yaml', data: makeRecord('A', { is_player: true }) },
            ]);

            expect(result.registry.size).toBe(1);
            expect(result.errors).toHaveLength(1);
            expect(result.errors[0]).toBeInstanceOf(RecordParseError);
            expect(result.errors[0]?.message).toBe("Failed to parse character record 'broken.yaml': bad indentation");
        });
    });

    describe('duplicate ids', () => {
        it('should keep the first record and report the second', () => {
            const result = new CharacterLoader().load([
                makeRecord('X', { name: 'First', is_player: true }),
                makeRecord('X', { name: 'Second' }),
            ]);

            expect(result.registry.get('X')?.name).toBe('First');

            const duplicates = result.errors.filter((e) => e instanceof DuplicateIdError);
            expect(duplicates).toHaveLength(1);
            expect(duplicates[0]?.source).toBe('record[1]');
            expect(duplicates[0]?.message).toBe(
                "Duplicate character ID 'X' in 'record[1]' (first defined in 'record[0]'). Original kept, duplicate ignored."
            );
        });

        it('should ignore the player flag of a dropped duplicate', () => {
            const result = new CharacterLoader().load([
                makeRecord('A', { is_player: true }),
                makeRecord('A', { is_player: true }),
            ]);

            expect(result.playerId).toBe('A');
            expect(result.errors.map((e) => e.kind)).toEqual(['duplicate-id']);
        });
    });

    describe('player designation', () => {
        it('should let the last player win and report both ids', () => {
            const result = new CharacterLoader().load([
                makeRecord('A', { is_player: true }),
                makeRecord('B'),
                makeRecord('C', { is_player: true }),
            ]);

            expect(result.playerId).toBe('C');

            const multiple = result.errors.filter((e): e is MultiplePlayersError => e instanceof MultiplePlayersError);
            expect(multiple).toHaveLength(1);
            expect(multiple[0]?.previousId).toBe('A');
            expect(multiple[0]?.nextId).toBe('C');
            expect(multiple[0]?.message).toBe(
                'Multiple player characters defined! Old: A, New: C. Using the latter: C.'
            );
        });

        it('should report a missing player', () => {
            const result = new CharacterLoader().load([makeRecord('A'), makeRecord('B')]);

            expect(result.playerId).toBeNull();
            expect(result.errors).toHaveLength(1);
            expect(result.errors[0]).toBeInstanceOf(NoPlayerDesignatedError);
        });
    });

    describe('relationship linking', () => {
        it('should leave a dangling spouse unlinked and still link the rest', () => {
            const result = new CharacterLoader().load([
                makeRecord('A', {
                    is_player: true,
                    relationship_ids: { spouse_id: 'GHOST', children_ids: ['B'] },
                }),
                makeRecord('B', { relationship_ids: { parent_ids: ['A'] } }),
            ]);

            const a = result.registry.get('A');
            const b = result.registry.get('B');
            expect(a?.spouse).toBeNull();
            expect(a?.children).toEqual([b]);
            expect(b?.parents).toEqual([a]);
            expect(result.errors).toEqual([]);
            expect(result.warnings).toHaveLength(1);
            expect(result.log).toContain(
                "  WARN: For character 'A', spouse ID 'GHOST' not found in loaded characters."
            );
        });

        it('should skip missing ids but keep source order for found ones', () => {
            const result = new CharacterLoader().load([
                makeRecord('K', { is_player: true, relationship_ids: { sibling_ids: ['S2', 'NOPE', 'S1'] } }),
                makeRecord('S1'),
                makeRecord('S2'),
            ]);

            expect(result.registry.get('K')?.siblings.map((s) => s.id)).toEqual(['S2', 'S1']);

            const warning = result.warnings[0];
            expect(warning).toBeInstanceOf(DanglingReferenceWarning);
            expect(warning?.ownerId).toBe('K');
            expect(warning?.relation).toBe('sibling');
            expect(warning?.missingId).toBe('NOPE');
            expect(warning?.severity).toBe('warning');
        });

        it('should not deduplicate repeated ids', () => {
            const result = new CharacterLoader().load([
                makeRecord('K', { is_player: true, relationship_ids: { parent_ids: ['M', 'M'] } }),
                makeRecord('M'),
            ]);

            const m = result.registry.get('M');
            expect(result.registry.get('K')?.parents).toEqual([m, m]);
        });

        it('should link to registered characters only, never to dropped duplicates', () => {
            const result = new CharacterLoader().load([
                makeRecord('M', { name: 'Kept', is_player: true }),
                makeRecord('K', { relationship_ids: { parent_ids: ['M'] } }),
                makeRecord('M', { name: 'Dropped' }),
            ]);

            expect(result.registry.get('K')?.parents[0]?.name).toBe('Kept');
        });

        it('should escalate dangling references when asked', () => {
            const result = new CharacterLoader({ escalateDanglingReferences: true }).load([
                makeRecord('A', { is_player: true, relationship_ids: { spouse_id: 'GHOST' } }),
            ]);

            expect(result.warnings).toHaveLength(1);
            expect(result.errors).toEqual(result.warnings);
            expect(result.log).toContain(
                "ERROR: For character 'A', spouse ID 'GHOST' not found in loaded characters."
            );
        });
    });

    describe('loadFromSource', () => {
        it('should read the source and note it in the log', () => {
            const records: SourcedRecord[] = [{ source: 'a.yaml', data: makeRecord('A', { is_player: true }) }];
            const source: RecordSource = { name: 'fixture', read: () => records };

            const result = loadFromSource(source);

            expect(result.registry.size).toBe(1);
            expect(result.log[0]).toBe('CharacterLoader: Read 1 records from fixture.');
        });

        it('should warn in the log when the source yields no records', () => {
            const source: RecordSource = { name: 'fixture', read: () => [] };

            const result = loadFromSource(source);

            expect(result.log).toEqual([
                'CharacterLoader: Read 0 records from fixture.',
                'WARN: No character records found in fixture.',
                'CharacterLoader: Processing 0 character records.',
                'CharacterLoader: Successfully parsed and preliminarily processed 0 unique characters.',
                'CharacterLoader: Linking character relationships...',
                '  No characters to link (character registry is empty).',
                'CharacterLoader: All characters loaded and linked successfully.',
            ]);
            expect(result.errors).toEqual([]);
        });
    });
});
