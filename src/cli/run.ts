import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import { DEFAULTS } from '../types/options.js';
import { createInvalidArgumentError, describeCause, isGraphException } from '../types/errors.js';
import { KnowledgeGraphPipeline } from '../pipeline.js';
import { RelationExtractor } from '../relations/extractor.js';
import { RelationVocabulary } from '../relations/vocabulary.js';
import { loadRelationVocabulary, readCustomRelations } from '../relations/storage.js';
import { OntologyMatcher } from '../ontology/matcher.js';
import { loadEquivalenceGroups } from '../ontology/equivalence.js';
import { parseOutputFormat } from '../graph/writers/registry.js';
import {
    ParsedArgs,
    parseArgs,
    parseIntegerOption,
    parseListOption,
    parseThresholdOption,
} from './args.js';

export const VERSION = '0.1.0';

export const HELP = `
ontograph v${VERSION} - build an RDF knowledge graph from a text document

Usage:
  ontograph generate <input>              Write <input basename>.ttl next to the input
  ontograph add-relation <name>           Add a custom relation to the relations file
  ontograph similar <a> <b>               Compare two property names
  ontograph map --source a,b --target c,d Map source properties onto target properties

Options:
  --max-questions <n>     Competency questions to generate (default ${DEFAULTS.maxQuestions})
  --output-format <fmt>   Output format (only "turtle")
  --relations <file>      Custom relations JSON (env ONTOGRAPH_RELATIONS)
  --equivalences <file>   Equivalence groups JSON (env ONTOGRAPH_EQUIVALENCES)
  --threshold <x>         Similarity threshold 0..1 (env ONTOGRAPH_THRESHOLD, default ${DEFAULTS.similarityThreshold})
  --with-signatures       Also emit rdfs:domain / rdfs:range for relations
  --description, --domain, --range   Fields for add-relation
  --help, -h              Show this help
  --version, -v           Show version

Examples:
  ontograph generate book.txt --max-questions 5
  ontograph add-relation "research area" --relations relations.json --domain Researcher
  ontograph similar "date of birth" born
`;

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
    env: Record<string, string | undefined>;
}

const defaultIO: CliIO = {
    out: line => console.log(line),
    err: line => console.error(line),
    env: process.env,
};

function requirePositional(args: ParsedArgs, index: number, what: string): string {
    const value = args.positionals[index];
    if (!value) {
        throw createInvalidArgumentError(what, '(missing)', `${what} argument`);
    }
    return value;
}

function optionOrEnv(args: ParsedArgs, io: CliIO, name: string, envName: string): string | undefined {
    return args.options.get(name) ?? (io.env[envName] || undefined);
}

async function buildMatcher(args: ParsedArgs, io: CliIO): Promise<OntologyMatcher> {
    const rawThreshold = optionOrEnv(args, io, 'threshold', 'ONTOGRAPH_THRESHOLD');
    const equivalencesPath = optionOrEnv(args, io, 'equivalences', 'ONTOGRAPH_EQUIVALENCES');

    return new OntologyMatcher({
        similarityThreshold: rawThreshold === undefined ? undefined : parseThresholdOption('threshold', rawThreshold),
        groups: equivalencesPath ? await loadEquivalenceGroups(equivalencesPath) : undefined,
    });
}

/**
 * `<dir>/<name>.<ext>` for an input `<dir>/<name>.<anything>`
 */
export function outputPathFor(inputPath: string, extension: string): string {
    const parsed = path.parse(inputPath);
    return path.join(parsed.dir, `${parsed.name}.${extension}`);
}

async function generate(args: ParsedArgs, io: CliIO): Promise<number> {
    const input = requirePositional(args, 1, 'input document');
    const outputFormat = parseOutputFormat(args.options.get('output-format') ?? DEFAULTS.outputFormat);
    const rawMax = args.options.get('max-questions');
    const maxQuestions = rawMax === undefined ? DEFAULTS.maxQuestions : parseIntegerOption('max-questions', rawMax);

    const matcher = await buildMatcher(args, io);
    const vocabulary = await loadRelationVocabulary(optionOrEnv(args, io, 'relations', 'ONTOGRAPH_RELATIONS'));
    const pipeline = new KnowledgeGraphPipeline({
        extractor: new RelationExtractor(vocabulary),
        matcher,
    });

    const result = await pipeline.runFile(input, {
        maxQuestions,
        outputFormat,
        includeSignatures: args.switches.has('with-signatures'),
    });

    const outputPath = outputPathFor(input, result.writer.fileExtension);
    await fs.writeFile(outputPath, result.graph, 'utf-8');

    io.out(`Knowledge graph saved to ${outputPath}`);
    io.out(chalk.dim(
        `${result.entities.length} entities, ${result.relations.length} relations, ${result.questions.length} questions`
    ));
    return 0;
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

async function addRelation(args: ParsedArgs, io: CliIO): Promise<number> {
    const name = requirePositional(args, 1, 'relation name');
    const relationsPath = optionOrEnv(args, io, 'relations', 'ONTOGRAPH_RELATIONS');
    if (!relationsPath) {
        throw createInvalidArgumentError('--relations', '(missing)', 'the custom relations file to update');
    }

    // An unreadable or invalid file aborts here, before anything is written back
    const existing = await fileExists(relationsPath) ? await readCustomRelations(relationsPath) : {};
    const extractor = new RelationExtractor(new RelationVocabulary(existing));
    const record = extractor.addRelation({
        relation: name,
        description: args.options.get('description'),
        domain: args.options.get('domain'),
        range: args.options.get('range'),
    });
    await extractor.saveRelations(relationsPath);

    io.out(`Relation '${record?.relation ?? name}' saved to ${relationsPath}`);
    return 0;
}

async function similar(args: ParsedArgs, io: CliIO): Promise<number> {
    const a = requirePositional(args, 1, 'first property');
    const b = requirePositional(args, 2, 'second property');
    const matcher = await buildMatcher(args, io);

    const verdict = matcher.similar(a, b);
    io.out(`${verdict ? chalk.green('similar') : chalk.yellow('not similar')} (ratio ${matcher.ratio(a, b).toFixed(3)})`);
    return 0;
}

async function map(args: ParsedArgs, io: CliIO): Promise<number> {
    const sources = parseListOption(args.options.get('source') ?? '');
    const targets = parseListOption(args.options.get('target') ?? '');
    if (sources.length === 0 || targets.length === 0) {
        throw createInvalidArgumentError('--source/--target', '(missing)', 'comma-separated property lists');
    }

    const matcher = await buildMatcher(args, io);
    const mapping = matcher.mapProperties(sources, targets);
    if (mapping.size === 0) {
        io.out('(no mappings)');
    }
    for (const [source, target] of mapping) {
        io.out(`${source} -> ${target}`);
    }
    return 0;
}

/**
 * Runs one CLI invocation and returns its exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
    try {
        const args = parseArgs(argv);
        const commandName = args.positionals[0];

        if (args.switches.has('version')) {
            io.out(VERSION);
            return 0;
        }
        if (args.switches.has('help') || !commandName) {
            io.out(HELP);
            return 0;
        }

        switch (commandName) {
            case 'generate':
                return await generate(args, io);
            case 'add-relation':
                return await addRelation(args, io);
            case 'similar':
                return await similar(args, io);
            case 'map':
                return await map(args, io);
            default:
                io.err(`Unknown command: ${commandName}`);
                io.out(HELP);
                return 1;
        }
    } catch (e) {
        io.err(chalk.red(`Error: ${describeCause(e)}`));
        if (isGraphException(e) && e.error.suggestion) {
            io.err(chalk.dim(e.error.suggestion));
        }
        return 1;
    }
}
