import fs from 'fs';
import path from 'path';
import { load as parseYaml } from 'js-yaml';
import { debug } from './logger';

export const CONFIG_FILE_NAME = '.docker-network-viz.yaml';

export const ENV_PREFIX = 'DNV_';

export const DEFAULT_DOCKER_SOCKET = '/var/run/docker.sock';

export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

type Settings = Pick<VizConfig, 'noColor' | 'onlyNetwork' | 'container' | 'noAliases'>;

export type PartialSettings = Partial<Settings>;

export interface ConfigSources {
    // Only the flags the user actually typed, so defaults never hide the other sources
    flags: PartialSettings;
    configFile?: string;
    env: NodeJS.ProcessEnv;
    home: string;
    cwd: string;
}

// Setting name, the key used for it in the config file and in the environment
const keys: { [K in keyof Settings]: { file: string, env: string } } = {
    noColor: { file: 'no-color', env: 'NO_COLOR' },
    onlyNetwork: { file: 'only-network', env: 'ONLY_NETWORK' },
    container: { file: 'container', env: 'CONTAINER' },
    noAliases: { file: 'no-aliases', env: 'NO_ALIASES' },
};

const settingNames: (keyof Settings)[] = ['noColor', 'onlyNetwork', 'container', 'noAliases'];

const defaults: Settings = {
    noColor: false,
    onlyNetwork: '',
    container: '',
    noAliases: false,
};

/**
 * Accepts the usual spellings of on and off
 *
 * @param value
 * @param source where the value came from, for the error message
 * @returns boolean
 */
export function parseBoolean(value: string, source: string): boolean {
    const normalized: string = value.trim().toLowerCase();

    if(['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if(['0', 'false', 'no', 'off'].includes(normalized)) return false;

    throw new ConfigError(`invalid boolean '${value}' in ${source}`);
}

/**
 * The config file to use: the one given on the command line, otherwise the first
 * one found in the home directory or the current directory
 *
 * @param sources
 * @returns string | undefined
 */
export function findConfigFile(sources: Pick<ConfigSources, 'configFile' | 'home' | 'cwd'>): string | undefined {
    if(sources.configFile !== undefined && sources.configFile !== '') {
        return sources.configFile;
    }

    return [sources.home, sources.cwd]
        .filter(dir => dir !== '')
        .map(dir => path.join(dir, CONFIG_FILE_NAME))
        .find(file => fs.existsSync(file));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the settings out of a YAML config file. A file that doesn't exist simply
 * contributes nothing, a file that exists has to be valid.
 *
 * @param file
 * @returns PartialSettings
 */
export function readConfigFile(file: string): PartialSettings {
    if(!fs.existsSync(file)) {
        debug(`Config file '${file}' does not exist, skipping it`);
        return {};
    }

    let document: unknown;

    try{
        document = parseYaml(fs.readFileSync(file, 'utf-8'));
    }catch(error) {
        throw new ConfigError(`failed to parse config file ${file}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    // An empty file parses to undefined
    if(document === undefined || document === null) {
        return {};
    }

    if(!isRecord(document)) {
        throw new ConfigError(`config file ${file} must contain a mapping of settings`);
    }

    const settings: PartialSettings = {};

    for(const name of settingNames) {
        const key: string = keys[name].file;
        const value: unknown = document[key];

        if(value === undefined || value === null) {
            continue;
        }

        if(!assign(settings, name, value)) {
            throw new ConfigError(`'${key}' in config file ${file} must be a ${typeof defaults[name]}`);
        }
    }

    debug(`Loaded config file '${file}'`, settings);

    return settings;
}

/**
 * Read the DNV_ prefixed environment variables, e.g. DNV_ONLY_NETWORK
 *
 * @param env
 * @returns PartialSettings
 */
export function readEnvironment(env: NodeJS.ProcessEnv): PartialSettings {
    const settings: PartialSettings = {};

    for(const name of settingNames) {
        const variable: string = ENV_PREFIX + keys[name].env;
        const value: string | undefined = env[variable];

        if(value === undefined) {
            continue;
        }

        assign(settings, name, typeof defaults[name] === 'boolean' ? parseBoolean(value, variable) : value);
    }

    return settings;
}

/**
 * Merge everything the user can configure. Flags beat the environment, the
 * environment beats the config file, and the config file beats the defaults.
 *
 * @param sources
 * @returns VizConfig
 */
export function loadConfig(sources: ConfigSources): VizConfig {
    const file: string | undefined = findConfigFile(sources);
    const fromFile: PartialSettings = file === undefined ? {} : readConfigFile(file);

    const settings: Settings = {
        ...defaults,
        ...fromFile,
        ...readEnvironment(sources.env),
        ...definedOnly(sources.flags),
    };

    return {
        ...settings,
        dockerSocket: sources.env.DOCKER_SOCKET ?? DEFAULT_DOCKER_SOCKET,
    };
}

// Sets the value when it has the type the setting needs, reports whether it did
function assign(settings: PartialSettings, name: keyof Settings, value: unknown): boolean {
    if(name === 'noColor' || name === 'noAliases') {
        if(typeof value !== 'boolean') return false;

        settings[name] = value;
        return true;
    }

    if(typeof value !== 'string') return false;

    settings[name] = value;
    return true;
}

function definedOnly(flags: PartialSettings): PartialSettings {
    const settings: PartialSettings = {};

    for(const name of settingNames) {
        if(flags[name] !== undefined) {
            assign(settings, name, flags[name]);
        }
    }

    return settings;
}
