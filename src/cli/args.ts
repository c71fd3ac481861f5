import { createInvalidArgumentError } from '../types/errors.js';

export interface ParsedArgs {
    positionals: string[];
    options: Map<string, string>;
    switches: Set<string>;
}

/** Flags that never take a value */
const SWITCHES = new Set(['help', 'version', 'with-signatures']);
const SHORT_SWITCHES: Record<string, string> = { h: 'help', v: 'version' };
/** Flags that take a value */
const VALUE_OPTIONS = new Set([
    'max-questions',
    'output-format',
    'relations',
    'equivalences',
    'threshold',
    'description',
    'domain',
    'range',
    'source',
    'target',
]);

/**
 * Splits argv into positionals, `--name value` / `--name=value` options and
 * bare switches. Unknown `--` names are rejected.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const options = new Map<string, string>();
    const switches = new Set<string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg.startsWith('--')) {
            const body = arg.slice(2);
            const eq = body.indexOf('=');
            const name = eq === -1 ? body : body.slice(0, eq);

            if (SWITCHES.has(name)) {
                switches.add(name);
            } else if (!VALUE_OPTIONS.has(name)) {
                throw createInvalidArgumentError('option', `--${name}`, 'a known option; see --help');
            } else if (eq !== -1) {
                options.set(name, body.slice(eq + 1));
            } else if (i + 1 < argv.length) {
                options.set(name, argv[i + 1]);
                i++;
            } else {
                throw createInvalidArgumentError(`option --${name}`, '(missing)', 'a value');
            }
        } else if (arg.startsWith('-') && arg.length === 2 && SHORT_SWITCHES[arg[1]]) {
            switches.add(SHORT_SWITCHES[arg[1]]);
        } else {
            positionals.push(arg);
        }
    }

    return { positionals, options, switches };
}

export function parseIntegerOption(name: string, raw: string): number {
    if (!/^\d+$/.test(raw.trim())) {
        throw createInvalidArgumentError(`--${name}`, raw, 'a non-negative integer');
    }
    return Number.parseInt(raw, 10);
}

export function parseThresholdOption(name: string, raw: string): number {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value) || value < 0 || value > 1) {
        throw createInvalidArgumentError(`--${name}`, raw, 'a number between 0 and 1');
    }
    return value;
}

export function parseListOption(raw: string): string[] {
    return raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
}
