import type { FailPolicy } from '../types/index.js';
import type { Character } from '../model/character.js';
import type { LoadResult } from '../loader/character-loader.js';

/**
 * Outcome of applying a fail policy to a load result.
 */
export interface LoadVerdict {
    ok: boolean;
    /** Messages of the issues that made the load fail */
    reasons: string[];
}

/**
 * Decide whether a load counts as successful. The loader itself never
 * decides; it only records issues.
 */
export function evaluateLoad(result: LoadResult, policy: FailPolicy): LoadVerdict {
    switch (policy) {
        case 'never':
            return { ok: true, reasons: [] };
        case 'critical': {
            const reasons = result.errors.filter((e) => e.kind === 'no-player').map((e) => e.message);
            return { ok: reasons.length === 0, reasons };
        }
        case 'any':
        default: {
            const reasons = result.errors.map((e) => e.message);
            return { ok: reasons.length === 0, reasons };
        }
    }
}

/**
 * Session state built from a load result. Passed explicitly to whatever
 * runs the session; there is no global game state.
 */
export class GameSession {
    private constructor(
        private readonly characters: ReadonlyMap<string, Character>,
        readonly playerId: string | null
    ) {}

    static fromLoadResult(result: LoadResult): GameSession {
        return new GameSession(result.registry, result.playerId);
    }

    get characterCount(): number {
        return this.characters.size;
    }

    getCharacter(id: string): Character | null {
        return this.characters.get(id) ?? null;
    }

    /** All characters in registry (load) order. */
    getAllCharacters(): Character[] {
        return Array.from(this.characters.values());
    }

    getPlayerCharacter(): Character | null {
        return this.playerId !== null ? this.getCharacter(this.playerId) : null;
    }
}
