#!/usr/bin/env node
import { Command, Option } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { CharacterLoader, loadFromSource, type LoadResult } from '../loader/character-loader.js';
import { RecordSourceError } from '../loader/issues.js';
import { YamlDirectorySource } from '../sources/yaml-directory.js';
import { GameSession, evaluateLoad } from '../session/game-session.js';
import { buildKinshipGraph, summarizeKinship } from '../graph/kinship.js';
import { EXPORT_EXTENSIONS, EXPORT_FORMATS, exportCharacters, isExportFormat } from '../exporters/export.js';
import type { FailPolicy, KindredConfig, LogLevel } from '../types/index.js';

const VERSION = '1.0.0';

interface CommonOptions {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    failOn?: FailPolicy;
    escalate?: boolean;
}

const program = new Command();

program
    .name('kindred')
    .description('Load, validate and link character definitions from YAML files.')
    .version(VERSION);

/**
 * Options shared by every command that loads characters.
 */
function withCommonOptions(command: Command): Command {
    return command
        .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
        .option('--json-logs', 'Output JSON logs')
        .addOption(new Option('--fail-on <policy>', 'Which issues fail the load').choices(['any', 'critical', 'never']))
        .option('--escalate', 'Treat unresolved relationship ids as errors');
}

/**
 * Resolve config, set up logging, and load + link the directory.
 * Exits the process when the directory cannot be read.
 */
async function loadCharacters(
    dir: string | undefined,
    opts: CommonOptions
): Promise<{ config: KindredConfig; result: LoadResult }> {
    const config = await resolveConfig({
        charactersDir: dir,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        failOn: opts.failOn,
        escalateDanglingReferences: opts.escalate,
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const logger = getLogger();
    logger.debug({ dir: config.charactersDir, failOn: config.failOn }, 'Starting character load');

    try {
        const source = new YamlDirectorySource(config.charactersDir, { extensions: config.extensions });
        const loader = new CharacterLoader({ escalateDanglingReferences: config.escalateDanglingReferences });
        return { config, result: loadFromSource(source, loader) };
    } catch (error) {
        if (error instanceof RecordSourceError) {
            logger.error({ location: error.location }, error.message);
            process.exit(1);
        }
        throw error;
    }
}

function printErrors(result: LoadResult): void {
    if (result.errors.length === 0) return;
    console.log(`\n  Errors (${result.errors.length}):`);
    for (const error of result.errors) {
        console.log(`    [${error.kind}] ${error.message}`);
    }
}

// ─── LOAD command ─────────────────────────────────────────

withCommonOptions(
    program
        .command('load')
        .description('Load and link characters, then report issues')
        .argument('[dir]', 'Characters directory')
        .option('-v, --verbose', 'Print the full load log')
).action(async (dir: string | undefined, opts: CommonOptions & { verbose?: boolean }) => {
    const { config, result } = await loadCharacters(dir, opts);
    const session = GameSession.fromLoadResult(result);

    if (opts.verbose) {
        console.log('');
        for (const line of result.log) {
            console.log(`  ${line}`);
        }
    }

    printErrors(result);

    const player = session.getPlayerCharacter();
    console.log(`\n  Loaded ${session.characterCount} characters`);
    console.log(`  Player: ${player ? player.shortDescription() : 'none'}`);
    console.log(`  Unresolved references: ${result.warnings.length}\n`);

    const verdict = evaluateLoad(result, config.failOn);
    if (!verdict.ok) {
        getLogger().error({ failOn: config.failOn, reasons: verdict.reasons }, 'Character load failed');
        process.exit(1);
    }
});

// ─── SHOW command ─────────────────────────────────────────

withCommonOptions(
    program
        .command('show')
        .description('Show the bio and family of one character')
        .argument('<id>', 'Character ID')
        .argument('[dir]', 'Characters directory')
).action(async (id: string, dir: string | undefined, opts: CommonOptions) => {
    const { result } = await loadCharacters(dir, opts);
    const character = GameSession.fromLoadResult(result).getCharacter(id);

    if (!character) {
        console.error(`Character not found: ${id}`);
        process.exit(1);
    }

    console.log(`\n${character.fullBio()}\n\n${character.familyInfo()}\n`);
});

// ─── EXPORT command ───────────────────────────────────────

withCommonOptions(
    program
        .command('export')
        .description('Export the linked characters to JSON, GraphML, Mermaid, or CSV')
        .argument('[dir]', 'Characters directory')
        .option('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
        .option('-o, --out <path>', 'Output file path')
).action(async (dir: string | undefined, opts: CommonOptions & { format?: string; out?: string }) => {
    const format = opts.format?.toLowerCase();
    if (format !== undefined && !isExportFormat(format)) {
        console.error(`Invalid format: ${format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
        process.exit(1);
    }

    const { config, result } = await loadCharacters(dir, opts);
    const exportFormat = format ?? config.exportFormat;
    const outputPath = opts.out ?? `characters${EXPORT_EXTENSIONS[exportFormat]}`;

    try {
        exportCharacters(result, outputPath, exportFormat);
        console.log(`Exported to ${outputPath}`);
    } catch (error) {
        getLogger().error({ error }, 'Export failed');
        process.exit(1);
    }
});

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(
    program
        .command('inspect')
        .description('Show character and relationship statistics')
        .argument('[dir]', 'Characters directory')
).action(async (dir: string | undefined, opts: CommonOptions) => {
    const { result } = await loadCharacters(dir, opts);
    const summary = summarizeKinship(buildKinshipGraph(result.registry));

    console.log('\n📊 Character Statistics\n');
    console.log(`  Characters: ${summary.characters}`);
    console.log(`  Player:     ${result.playerId ?? 'none'}`);
    console.log(`  Links:      ${summary.links}`);
    console.log(`  Errors:     ${result.errors.length}`);
    console.log(`  Warnings:   ${result.warnings.length}`);

    console.log('\n  Link Kinds:');
    for (const [kind, count] of Object.entries(summary.linksByKind)) {
        console.log(`    ${kind}: ${count}`);
    }

    if (summary.isolated.length > 0) {
        console.log(`\n  Unlinked characters: ${summary.isolated.join(', ')}`);
    }

    console.log('');
});

await program.parseAsync();
