import { OUTPUT_FORMATS, OutputFormat } from '../../types/graph.js';
import { createUnsupportedFormatError } from '../../types/errors.js';
import type { GraphWriter } from './interface.js';
import { TurtleWriter } from './turtle.js';

const WRITERS: Record<OutputFormat, () => GraphWriter> = {
    turtle: () => new TurtleWriter(),
};

const FORMAT_NAMES: ReadonlySet<string> = new Set(OUTPUT_FORMATS);

export function isOutputFormat(value: string): value is OutputFormat {
    return FORMAT_NAMES.has(value);
}

/**
 * Resolves a user-supplied format name. Names match exactly; anything
 * outside OUTPUT_FORMATS, other spellings included, is UNSUPPORTED_FORMAT.
 */
export function parseOutputFormat(value: string): OutputFormat {
    if (!isOutputFormat(value)) {
        throw createUnsupportedFormatError(value, OUTPUT_FORMATS);
    }
    return value;
}

export function createGraphWriter(format: string = 'turtle'): GraphWriter {
    return WRITERS[parseOutputFormat(format)]();
}
