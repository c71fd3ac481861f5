import { DataFactory, Writer } from 'n3';
import type { KnowledgeGraph } from '../../types/graph.js';
import type { GraphWriter } from './interface.js';

/**
 * Turtle output through the N3.js writer. Triples are written in graph
 * order; consecutive triples sharing a subject are grouped with `;`.
 */
export class TurtleWriter implements GraphWriter {
    readonly format = 'turtle' as const;
    readonly fileExtension = 'ttl';

    serialize(graph: KnowledgeGraph): Promise<string> {
        const writer = new Writer({
            format: 'Turtle',
            prefixes: Object.fromEntries(graph.prefixes),
        });

        for (const { subject, predicate, object } of graph.triples) {
            writer.addQuad(DataFactory.quad(subject, predicate, object));
        }

        return new Promise<string>((resolve, reject) => {
            writer.end((error: Error | null, result: string) => {
                if (error) {
                    reject(error);
                } else {
                    resolve(result);
                }
            });
        });
    }
}
