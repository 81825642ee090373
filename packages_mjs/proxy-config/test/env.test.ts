import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import {
    EnvironmentFileError,
    PROXY_ENV_VARS,
    createMapEnvironment,
    getProxyEnv,
    loadEnvironmentFile,
    lookupVariable,
} from '../src';

describe('lookupVariable', () => {
    it('should prefer the lowercase name', () => {
        const env = createMapEnvironment({ http_proxy: 'lower', HTTP_PROXY: 'upper' });
        expect(lookupVariable(env, PROXY_ENV_VARS.http)).toEqual({
            value: 'lower',
            source: 'http_proxy',
            tried: ['http_proxy'],
        });
    });

    it('should fall back to the uppercase name', () => {
        const env = createMapEnvironment({ HTTP_PROXY: 'upper' });
        expect(lookupVariable(env, PROXY_ENV_VARS.http)).toEqual({
            value: 'upper',
            source: 'HTTP_PROXY',
            tried: ['http_proxy', 'HTTP_PROXY'],
        });
    });

    it('should keep an empty lowercase value', () => {
        const env = createMapEnvironment({ no_proxy: '', NO_PROXY: '*' });
        expect(lookupVariable(env, PROXY_ENV_VARS.no).value).toBe('');
    });

    it('should report a missing pair', () => {
        expect(lookupVariable(createMapEnvironment({}), PROXY_ENV_VARS.ftp)).toEqual({
            value: null,
            source: null,
            tried: ['ftp_proxy', 'FTP_PROXY'],
        });
    });
});

describe('createMapEnvironment', () => {
    it('should treat undefined entries as absent', () => {
        const env = createMapEnvironment({ http_proxy: undefined, HTTP_PROXY: 'upper' });
        expect(env.get('http_proxy')).toBeUndefined();
        expect(env.get('HTTP_PROXY')).toBe('upper');
    });

    it('should copy a Map', () => {
        const source = new Map([['all_proxy', 'http://proxy.example.com:8080']]);
        const env = createMapEnvironment(source);
        source.set('all_proxy', 'changed');
        expect(env.get('all_proxy')).toBe('http://proxy.example.com:8080');
    });

    it('should be case-sensitive', () => {
        const env = createMapEnvironment({ http_proxy: 'lower' });
        expect(env.get('Http_Proxy')).toBeUndefined();
    });
});

describe('loadEnvironmentFile', () => {
    let dir: string;

    beforeAll(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'proxy-config-'));
    });

    afterAll(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should parse dotenv syntax', () => {
        const file = path.join(dir, '.env.proxy');
        fs.writeFileSync(file, [
            '# corporate proxy',
            'https_proxy=http://proxy.example.com:8080',
            'NO_PROXY="localhost,.internal"',
            '',
        ].join('\n'));

        const env = loadEnvironmentFile(file);
        expect(env.get('https_proxy')).toBe('http://proxy.example.com:8080');
        expect(env.get('NO_PROXY')).toBe('localhost,.internal');
        expect(env.get('http_proxy')).toBeUndefined();
    });

    it('should not write to process.env', () => {
        const file = path.join(dir, '.env.isolated');
        fs.writeFileSync(file, 'PROXY_CONFIG_TEST_ONLY=1\n');

        loadEnvironmentFile(file);
        expect(process.env.PROXY_CONFIG_TEST_ONLY).toBeUndefined();
    });

    it('should throw EnvironmentFileError for a missing file', () => {
        const file = path.join(dir, 'missing.env');
        expect(() => loadEnvironmentFile(file)).toThrow(EnvironmentFileError);
        expect(() => loadEnvironmentFile(file)).toThrow(`Cannot load environment file '${file}'`);
    });
});

describe('getProxyEnv', () => {
    it('should list all ten variables', () => {
        const snapshot = getProxyEnv(createMapEnvironment({ ALL_PROXY: 'http://proxy.example.com:8080' }));
        expect(Object.keys(snapshot).sort()).toEqual([
            'ALL_PROXY', 'FTP_PROXY', 'HTTPS_PROXY', 'HTTP_PROXY', 'NO_PROXY',
            'all_proxy', 'ftp_proxy', 'http_proxy', 'https_proxy', 'no_proxy',
        ]);
        expect(snapshot.ALL_PROXY).toBe('http://proxy.example.com:8080');
        expect(snapshot.all_proxy).toBeUndefined();
    });
});
