import os from 'os';
import { Command } from 'commander';
import { CONFIG_FILE_NAME, PartialSettings, loadConfig } from './config';
import { NetworkVizClient, createDocker } from './docker';
import { createStyle, shouldUseColor } from './output';
import { runVisualize } from './visualize';
import { debug } from './logger';

export const APP_NAME = 'docker-network-viz';

export const APP_VERSION = '1.0.0';

export const APP_DESCRIPTION = 'Visualize Docker network topology in a tree-style format';

export interface CliDependencies {
    createClient: (config: VizConfig) => NetworkVizClient;
    stdout: OutputSink & { isTTY?: boolean };
    stderr: OutputSink;
    env: NodeJS.ProcessEnv;
    home: string;
    cwd: string;
}

export function defaultDependencies(): CliDependencies {
    return {
        createClient: config => new NetworkVizClient(createDocker(config)),
        stdout: process.stdout,
        stderr: process.stderr,
        env: process.env,
        home: os.homedir(),
        cwd: process.cwd(),
    };
}

/**
 * Only the flags typed on the command line count here, commander's defaults
 * would otherwise win over the environment and the config file
 *
 * @param command
 * @returns PartialSettings
 */
function explicitFlags(command: Command): PartialSettings {
    const values = command.optsWithGlobals();
    const flags: PartialSettings = {};
    const fromCli = (key: string): boolean => command.getOptionValueSourceWithGlobals(key) === 'cli';

    if(fromCli('color')) {
        flags.noColor = values.color === false;
    }

    if(fromCli('aliases')) {
        flags.noAliases = values.aliases === false;
    }

    if(fromCli('onlyNetwork') && typeof values.onlyNetwork === 'string') {
        flags.onlyNetwork = values.onlyNetwork;
    }

    if(fromCli('container') && typeof values.container === 'string') {
        flags.container = values.container;
    }

    return flags;
}

async function visualize(command: Command, deps: CliDependencies): Promise<void> {
    const configFile: unknown = command.optsWithGlobals().config;

    const config: VizConfig = loadConfig({
        flags: explicitFlags(command),
        configFile: typeof configFile === 'string' ? configFile : undefined,
        env: deps.env,
        home: deps.home,
        cwd: deps.cwd,
    });

    debug('Resolved configuration', config);

    const style = createStyle({ enabled: shouldUseColor({ noColor: config.noColor, stream: deps.stdout }, deps.env) });
    const client: NetworkVizClient = deps.createClient(config);

    await client.ping();
    await runVisualize(client, deps.stdout, config, style);
}

/**
 * Build the command line interface. Running it without a subcommand runs
 * visualize, so `docker-network-viz --only-network bridge` and
 * `docker-network-viz visualize --only-network bridge` do the same thing.
 *
 * Commander is told not to exit the process itself; help, version and usage
 * errors come back as a CommanderError for the caller to act on.
 *
 * @param deps
 * @returns Command
 */
export function createProgram(deps: CliDependencies = defaultDependencies()): Command {
    const program = new Command();

    program
        .name(APP_NAME)
        .description(APP_DESCRIPTION)
        .version(APP_VERSION)
        .option('--config <file>', `config file (default is $HOME/${CONFIG_FILE_NAME})`)
        .option('--no-color', 'disable colored output')
        .configureOutput({
            writeOut: text => deps.stdout.write(text),
            writeErr: text => deps.stderr.write(text),
        })
        .exitOverride();

    program
        .command('visualize', { isDefault: true })
        .description('Display Docker network topology')
        .addHelpText('after', `
This command displays two views:
1. Network tree: each network with its connected containers and aliases
2. Container reachability: each container with the networks it belongs to
   and the other containers it can reach through those networks

Examples:
  $ ${APP_NAME} visualize
  $ ${APP_NAME} visualize --only-network bridge
  $ ${APP_NAME} visualize --container web_app
  $ ${APP_NAME} visualize --no-aliases`)
        .option('--only-network <name>', 'show only the specified network')
        .option('--container <name>', "show only the specified container's connectivity")
        .option('--no-aliases', 'hide container aliases in the output')
        .action(async (_options: unknown, command: Command) => {
            await visualize(command, deps);
        });

    return program;
}
