import type { Entity } from '../types/entity.js';
import { createExtractionFailure } from '../types/errors.js';
import type { EntityRecognizer } from './recognizer.js';
import { CompromiseRecognizer } from './compromise.js';

/**
 * Runs the configured recognizer over a document. A recognizer failure is
 * reported as EXTRACTION_FAILURE with the original error as cause.
 */
export class EntityObserver {
    private readonly recognizer: EntityRecognizer;

    constructor(recognizer: EntityRecognizer = new CompromiseRecognizer()) {
        this.recognizer = recognizer;
    }

    async observe(text: string): Promise<Entity[]> {
        try {
            const entities = await this.recognizer.recognize(text);
            return entities.map(({ text: surface, type }) => ({ text: surface, type }));
        } catch (e) {
            throw createExtractionFailure(`Entity recognition (${this.recognizer.name}) failed`, e);
        }
    }
}
