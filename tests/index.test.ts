import { describe, it, expect, afterEach, vi } from 'vitest';
import * as path from 'path';
import { candidates, getDefaultModel, rejoin, resetDefaultModel, split, ArtifactError } from '../src/index';
import { FIXTURES_DIR } from './helpers';

describe('default model', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
        resetDefaultModel();
    });

    it('should load once and be shared', async () => {
        const first = await getDefaultModel();
        const second = await getDefaultModel();
        expect(second).toBe(first);
        expect(first.language).toBe('en');
    });

    it('should expose module-level helpers', async () => {
        expect(await split('DEREKANDERSON')).toEqual(['DEREK', 'ANDERSON']);
        expect(await candidates('win32intel', 1)).toEqual([['win', '32', 'intel']]);
        expect(await rejoin('youarewearing!')).toBe('you are wearing!');
    });

    it('should retry after a failed load', async () => {
        vi.stubEnv('WORDSPLIT_RESOURCES_DIR', path.join(FIXTURES_DIR, 'nowhere'));
        await expect(getDefaultModel()).rejects.toThrow(ArtifactError);

        vi.unstubAllEnvs();
        const model = await getDefaultModel();
        expect(model.size).toBe(118);
    });
});
