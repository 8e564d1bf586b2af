import { describe, it, expect } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PROJECT_ROOT, resolveConfigDir } from './paths';
import { settlesWithin } from './timing';

describe('resolveConfigDir', () => {
    it('uses the override when set', () => {
        expect(resolveConfigDir({ TALKALERT_CONFIG_DIR: '/tmp/talkalert-conf', APPDATA: 'C:\\Users\\test\\AppData\\Roaming' }))
            .toBe('/tmp/talkalert-conf');
    });

    it('puts the folder under APPDATA when present', () => {
        expect(resolveConfigDir({ APPDATA: '/appdata' })).toBe(path.join('/appdata', 'TalkAlert'));
    });

    it('falls back to the home directory', () => {
        expect(resolveConfigDir({})).toBe(path.join(os.homedir(), 'TalkAlert'));
    });
});

describe('PROJECT_ROOT', () => {
    it('points at the directory holding package.json', () => {
        expect(fs.existsSync(path.join(PROJECT_ROOT, 'package.json'))).toBe(true);
        expect(fs.existsSync(path.join(PROJECT_ROOT, 'assets', 'tray-icon.png'))).toBe(true);
    });
});

describe('settlesWithin', () => {
    it('resolves true for a promise that settles in time', async () => {
        expect(await settlesWithin(Promise.resolve('done'), 50)).toBe(true);
        expect(await settlesWithin(Promise.reject(new Error('failed')), 50)).toBe(true);
    });

    it('resolves false on timeout', async () => {
        expect(await settlesWithin(new Promise<void>(() => undefined), 10)).toBe(false);
    });
});
