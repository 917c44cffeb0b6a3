import chalk from 'chalk';

export type StyleCategory = 'network' | 'container' | 'alias' | 'label' | 'tree';

/**
 * Decorates a piece of output according to what it is. The renderers call this
 * for every token they print, and must produce the same text, apart from the
 * decoration, whichever style they are handed.
 */
export type Style = (category: StyleCategory, text: string) => string;

export const plainStyle: Style = (_category, text) => text;

// Basic 16 colour ANSI is all the palette below needs
const colors = new chalk.Instance({ level: 1 });

const palette: Record<StyleCategory, chalk.Chalk> = {
    network: colors.cyan.bold,
    container: colors.green,
    alias: colors.yellow,
    label: colors.magenta,
    tree: colors.blue,
};

export function createStyle(options: { enabled: boolean }): Style {
    if(!options.enabled) {
        return plainStyle;
    }

    return (category, text) => palette[category](text);
}

/**
 * Colour is only worth sending to a terminal, and only when the user hasn't
 * turned it off, either with the tool's own setting or with NO_COLOR
 */
export function shouldUseColor(options: { noColor: boolean, stream: { isTTY?: boolean } }, env: NodeJS.ProcessEnv = process.env): boolean {
    if(options.noColor) {
        return false;
    }

    // https://no-color.org: any non-empty value
    if(env.NO_COLOR !== undefined && env.NO_COLOR !== '') {
        return false;
    }

    return options.stream.isTTY === true && chalk.supportsColor !== false;
}
