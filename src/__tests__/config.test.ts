import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadEnvVars, resolveConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('Config', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kindred-config-'));
        vi.stubEnv('KINDRED_CHARACTERS_DIR', '');
        vi.stubEnv('KINDRED_LOG_LEVEL', '');
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    const writeConfig = (config: unknown) =>
        fs.writeFileSync(path.join(dir, 'kindred.config.json'), JSON.stringify(config));

    it('should fall back to defaults without a config file', async () => {
        expect(await resolveConfig({}, dir)).toEqual(DEFAULT_CONFIG);
    });

    it('should let CLI flags override the config file', async () => {
        writeConfig({ charactersDir: './cast', failOn: 'any' });

        const config = await resolveConfig({ failOn: 'never', charactersDir: undefined }, dir);

        expect(config.charactersDir).toBe('./cast');
        expect(config.failOn).toBe('never');
        expect(config.logLevel).toBe('info');
    });

    it('should let env vars override the config file', async () => {
        writeConfig({ charactersDir: './cast' });
        vi.stubEnv('KINDRED_CHARACTERS_DIR', '/srv/cast');

        expect((await resolveConfig({}, dir)).charactersDir).toBe('/srv/cast');
    });

    it('should ignore an invalid config file', async () => {
        writeConfig({ failOn: 'sometimes' });

        expect(await resolveConfig({}, dir)).toEqual(DEFAULT_CONFIG);
    });

    describe('loadEnvVars', () => {
        it('should read known log levels only', () => {
            expect(loadEnvVars({ KINDRED_LOG_LEVEL: 'debug' })).toEqual({ logLevel: 'debug' });
            expect(loadEnvVars({ KINDRED_LOG_LEVEL: 'chatty' })).toEqual({});
        });

        it('should read the characters directory', () => {
            expect(loadEnvVars({ KINDRED_CHARACTERS_DIR: 'data/cast' })).toEqual({ charactersDir: 'data/cast' });
        });
    });
});
