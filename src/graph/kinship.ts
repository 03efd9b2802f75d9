import { MultiDirectedGraph } from 'graphology';
import type { RelationKind } from '../types/index.js';
import type { Character } from '../model/character.js';
import { getLogger } from '../utils/logger.js';

export type CharacterNodeAttributes = {
    name: string;
    age: number;
    gender: string;
    isPlayer: boolean;
};

export type KinshipEdgeAttributes = {
    kind: RelationKind;
};

export type KinshipGraph = MultiDirectedGraph<CharacterNodeAttributes, KinshipEdgeAttributes>;

export interface KinshipSummary {
    characters: number;
    links: number;
    linksByKind: Record<RelationKind, number>;
    /** Characters with no resolved link in either direction */
    isolated: string[];
}

/**
 * Project a linked registry into a directed multigraph.
 * One edge per resolved link, directed from the character that declared it,
 * so a mutual spouse pair yields two edges.
 *
 * @param registry - Characters after relationship linking
 */
export function buildKinshipGraph(registry: ReadonlyMap<string, Character>): KinshipGraph {
    const graph: KinshipGraph = new MultiDirectedGraph<CharacterNodeAttributes, KinshipEdgeAttributes>();

    for (const character of registry.values()) {
        graph.addNode(character.id, {
            name: character.name,
            age: character.age,
            gender: character.gender,
            isPlayer: character.isPlayer,
        });
    }

    const link = (from: Character, to: Character, kind: RelationKind) => {
        // Skip links to characters outside this registry
        if (graph.hasNode(to.id)) {
            graph.addEdge(from.id, to.id, { kind });
        }
    };

    for (const character of registry.values()) {
        if (character.spouse) link(character, character.spouse, 'spouse');
        for (const parent of character.parents) link(character, parent, 'parent');
        for (const child of character.children) link(character, child, 'child');
        for (const sibling of character.siblings) link(character, sibling, 'sibling');
    }

    getLogger().debug({ nodeCount: graph.order, edgeCount: graph.size }, 'Kinship graph built');
    return graph;
}

/**
 * Count links by kind and find characters nobody links to or from.
 */
export function summarizeKinship(graph: KinshipGraph): KinshipSummary {
    const linksByKind: Record<RelationKind, number> = { spouse: 0, parent: 0, child: 0, sibling: 0 };
    graph.forEachEdge((_edge, attributes) => {
        linksByKind[attributes.kind]++;
    });

    const isolated: string[] = [];
    graph.forEachNode((node) => {
        if (graph.degree(node) === 0) isolated.push(node);
    });

    return {
        characters: graph.order,
        links: graph.size,
        linksByKind,
        isolated,
    };
}
