import type { KnowledgeGraph, OutputFormat } from '../../types/graph.js';

/**
 * Serializes an assembled graph to one textual exchange format.
 */
export interface GraphWriter {
    readonly format: OutputFormat;
    /** Extension, without the dot, of files written in this format */
    readonly fileExtension: string;
    serialize(graph: KnowledgeGraph): Promise<string>;
}
