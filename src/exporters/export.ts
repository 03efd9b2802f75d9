import { writeFileSync } from 'node:fs';
import type { ExportFormat } from '../types/index.js';
import type { LoadResult } from '../loader/character-loader.js';
import { buildKinshipGraph, type KinshipGraph } from '../graph/kinship.js';
import { getLogger } from '../utils/logger.js';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'graphml', 'mermaid', 'csv'];

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    json: '.json',
    graphml: '.graphml',
    mermaid: '.md',
    csv: '.csv',
};

// ─── Main Export Functions ───────────────────────────────

/**
 * Render a load result in the given format.
 */
export function renderExport(result: LoadResult, format: ExportFormat): string {
    const graph = buildKinshipGraph(result.registry);

    switch (format) {
        case 'json':
            return exportJson(result, graph);
        case 'graphml':
            return exportGraphML(graph);
        case 'mermaid':
            return exportMermaid(graph);
        case 'csv':
            return exportCSV(graph);
        default:
            throw new Error(`Unsupported export format: ${String(format)}`);
    }
}

/**
 * Render a load result and write it to `outputPath`.
 */
export function exportCharacters(result: LoadResult, outputPath: string, format: ExportFormat): void {
    const content = renderExport(result, format);
    writeFileSync(outputPath, content, 'utf-8');
    getLogger().info({ format, outputPath, characters: result.registry.size }, 'Characters exported');
}

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((f) => f === value);
}

// ─── Format Implementations ─────────────────────────────

function exportJson(result: LoadResult, graph: KinshipGraph): string {
    const links: Array<{ source: string; target: string; kind: string }> = [];
    graph.forEachEdge((_edge, attributes, source, target) => {
        links.push({ source, target, kind: attributes.kind });
    });

    return JSON.stringify({
        kindred: {
            version: '1.0.0',
            exported_at: new Date().toISOString(),
        },
        player_id: result.playerId,
        characters: Array.from(result.registry.values()).map((c) => ({
            id: c.id,
            name: c.name,
            age: c.age,
            gender: c.gender,
            bio: c.bio,
            is_player: c.isPlayer,
            traits: c.traits,
            skills: c.skills,
            assets: c.assets,
            relationship_ids: c.relationshipIds,
        })),
        links,
        errors: result.errors.map((e) => ({ kind: e.kind, source: e.source, message: e.message })),
    }, null, 2);
}

const esc = (s: string) =>
    s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

function exportGraphML(graph: KinshipGraph): string {
    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <key id="name" for="node" attr.name="name" attr.type="string"/>
  <key id="age" for="node" attr.name="age" attr.type="int"/>
  <key id="gender" for="node" attr.name="gender" attr.type="string"/>
  <key id="is_player" for="node" attr.name="is_player" attr.type="boolean"/>
  <key id="kind" for="edge" attr.name="kind" attr.type="string"/>
  <graph id="kindred" edgedefault="directed">
`;

    graph.forEachNode((node, attributes) => {
        xml += `    <node id="${esc(node)}">
      <data key="name">${esc(attributes.name)}</data>
      <data key="age">${attributes.age}</data>
      <data key="gender">${esc(attributes.gender)}</data>
      <data key="is_player">${attributes.isPlayer}</data>
    </node>
`;
    });

    graph.forEachEdge((_edge, attributes, source, target) => {
        xml += `    <edge source="${esc(source)}" target="${esc(target)}">
      <data key="kind">${attributes.kind}</data>
    </edge>
`;
    });

    xml += `  </graph>
</graphml>`;

    return xml;
}

function exportMermaid(graph: KinshipGraph): string {
    let diagram = 'graph TD\n';

    // Character ids are free-form, so nodes get positional Mermaid ids
    const nodeIds = new Map<string, string>();
    graph.forEachNode((node, attributes) => {
        const nodeId = `C${nodeIds.size}`;
        nodeIds.set(node, nodeId);
        const label = `${attributes.name} (${attributes.age}${attributes.gender})`.replace(/"/g, "'");
        diagram += `  ${nodeId}["${label}"]\n`;
    });

    diagram += '\n';

    const maxEdges = 200;
    let rendered = 0;
    graph.forEachEdge((_edge, attributes, source, target) => {
        if (rendered >= maxEdges) return;
        const arrow = attributes.kind === 'parent' || attributes.kind === 'child' ? '-->' : '-.->';
        diagram += `  ${nodeIds.get(source)} ${arrow}|${attributes.kind}| ${nodeIds.get(target)}\n`;
        rendered++;
    });

    if (graph.size > maxEdges) {
        diagram += `\n  %% Note: ${graph.size - maxEdges} additional links omitted\n`;
    }

    return diagram;
}

function exportCSV(graph: KinshipGraph): string {
    const quote = (s: string) => `"${s.replace(/"/g, '""')}"`;

    let csv = 'id,name,age,gender,is_player\n';
    graph.forEachNode((node, attributes) => {
        csv += [quote(node), quote(attributes.name), attributes.age, quote(attributes.gender), attributes.isPlayer].join(',') + '\n';
    });

    csv += '\n# LINKS\nsource,target,kind\n';
    graph.forEachEdge((_edge, attributes, source, target) => {
        csv += `${quote(source)},${quote(target)},${attributes.kind}\n`;
    });

    return csv;
}
