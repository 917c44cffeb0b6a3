import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CONFIG_FILE_NAME, ConfigError, DEFAULT_DOCKER_SOCKET, findConfigFile, loadConfig, parseBoolean, readConfigFile, readEnvironment } from './config';

let home: string;
let cwd: string;

beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'viz-home-'));
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'viz-cwd-'));
});

afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
    fs.rmSync(cwd, { recursive: true, force: true });
});

function writeConfig(dir: string, contents: string, name: string = CONFIG_FILE_NAME): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, contents);
    return file;
}

describe('parseBoolean', () => {
    it('understands the usual spellings', () => {
        expect(['1', 'true', 'TRUE', 'yes', 'on', ' On '].map(value => parseBoolean(value, 'test'))).toEqual([true, true, true, true, true, true]);
        expect(['0', 'false', 'False', 'no', 'off'].map(value => parseBoolean(value, 'test'))).toEqual([false, false, false, false, false]);
    });

    it('rejects anything else', () => {
        expect(() => parseBoolean('maybe', 'DNV_NO_ALIASES')).toThrow(new ConfigError("invalid boolean 'maybe' in DNV_NO_ALIASES"));
    });
});

describe('findConfigFile', () => {
    it('uses the file given on the command line even when it does not exist', () => {
        expect(findConfigFile({ configFile: '/nonexistent/config.yaml', home, cwd })).toBe('/nonexistent/config.yaml');
    });

    it('prefers the home directory over the current directory', () => {
        const inHome = writeConfig(home, 'container: a\n');
        writeConfig(cwd, 'container: b\n');

        expect(findConfigFile({ home, cwd })).toBe(inHome);
    });

    it('falls back to the current directory', () => {
        const inCwd = writeConfig(cwd, 'container: b\n');

        expect(findConfigFile({ home, cwd })).toBe(inCwd);
    });

    it('finds nothing when there is no file', () => {
        expect(findConfigFile({ home, cwd })).toBeUndefined();
    });
});

describe('readConfigFile', () => {
    it('reads the settings', () => {
        const file = writeConfig(home, 'only-network: bridge\ncontainer: web_app\nno-aliases: true\nno-color: false\n');

        expect(readConfigFile(file)).toEqual({ onlyNetwork: 'bridge', container: 'web_app', noAliases: true, noColor: false });
    });

    it('ignores unknown keys and empty values', () => {
        const file = writeConfig(home, 'unknown: 1\ncontainer:\n');

        expect(readConfigFile(file)).toEqual({});
    });

    it('returns nothing for a missing file', () => {
        expect(readConfigFile(path.join(home, 'missing.yaml'))).toEqual({});
    });

    it('returns nothing for an empty file', () => {
        expect(readConfigFile(writeConfig(home, ''))).toEqual({});
    });

    it('rejects a file that is not YAML', () => {
        const file = writeConfig(home, 'container: [unclosed\n');

        expect(() => readConfigFile(file)).toThrow(ConfigError);
        expect(() => readConfigFile(file)).toThrow(`failed to parse config file ${file}`);
    });

    it('rejects a file that is not a mapping', () => {
        const file = writeConfig(home, '- bridge\n- host\n');

        expect(() => readConfigFile(file)).toThrow(`config file ${file} must contain a mapping of settings`);
    });

    it('rejects values of the wrong type', () => {
        const file = writeConfig(home, 'no-aliases: sometimes\n');

        expect(() => readConfigFile(file)).toThrow(`'no-aliases' in config file ${file} must be a boolean`);
    });
});

describe('readEnvironment', () => {
    it('reads the prefixed variables', () => {
        expect(readEnvironment({
            DNV_ONLY_NETWORK: 'bridge',
            DNV_CONTAINER: 'api',
            DNV_NO_ALIASES: 'true',
            DNV_NO_COLOR: '0',
            ONLY_NETWORK: 'ignored',
        })).toEqual({ onlyNetwork: 'bridge', container: 'api', noAliases: true, noColor: false });
    });

    it('rejects a boolean it cannot read', () => {
        expect(() => readEnvironment({ DNV_NO_COLOR: 'sure' })).toThrow("invalid boolean 'sure' in DNV_NO_COLOR");
    });
});

describe('loadConfig', () => {
    it('falls back to the defaults', () => {
        expect(loadConfig({ flags: {}, env: {}, home, cwd })).toEqual({
            noColor: false,
            onlyNetwork: '',
            container: '',
            noAliases: false,
            dockerSocket: DEFAULT_DOCKER_SOCKET,
        });
    });

    it('lets the environment override the config file and flags override both', () => {
        writeConfig(home, 'only-network: from-file\ncontainer: from-file\nno-aliases: true\n');

        const config = loadConfig({
            flags: { container: 'from-flag' },
            env: { DNV_ONLY_NETWORK: 'from-env', DNV_CONTAINER: 'from-env' },
            home,
            cwd,
        });

        expect(config.container).toBe('from-flag');
        expect(config.onlyNetwork).toBe('from-env');
        expect(config.noAliases).toBe(true);
    });

    it('lets a flag turn a setting off again', () => {
        writeConfig(home, 'no-aliases: true\n');

        expect(loadConfig({ flags: { noAliases: false }, env: {}, home, cwd }).noAliases).toBe(false);
    });

    it('reads the file given on the command line', () => {
        const file = writeConfig(cwd, 'no-color: true\n', 'custom.yaml');

        expect(loadConfig({ flags: {}, configFile: file, env: {}, home, cwd }).noColor).toBe(true);
    });

    it('does not mind a config file that is missing', () => {
        expect(loadConfig({ flags: {}, configFile: '/nonexistent/config.yaml', env: {}, home, cwd }).onlyNetwork).toBe('');
    });

    it('takes the socket from DOCKER_SOCKET', () => {
        expect(loadConfig({ flags: {}, env: { DOCKER_SOCKET: '/tmp/test.sock' }, home, cwd }).dockerSocket).toBe('/tmp/test.sock');
    });
});
