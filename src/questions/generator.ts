import type { Entity } from '../types/entity.js';
import { DEFAULTS } from '../types/options.js';
import { createInvalidArgumentError } from '../types/errors.js';

/** Entity labels questions are asked about */
export const QUESTION_ENTITY_TYPES: readonly string[] = ['PERSON', 'ORG', 'GPE', 'DATE'];

/**
 * Competency questions: one per eligible entity, in entity order.
 */
export class QuestionGenerator {
    generate(entities: readonly Entity[], maxQuestions: number = DEFAULTS.maxQuestions): string[] {
        if (!Number.isInteger(maxQuestions) || maxQuestions < 0) {
            throw createInvalidArgumentError('max questions', maxQuestions, 'a non-negative integer');
        }

        const questions: string[] = [];
        for (const entity of entities) {
            if (questions.length >= maxQuestions) break;
            if (QUESTION_ENTITY_TYPES.includes(entity.type)) {
                questions.push(`What is the ${entity.type.toLowerCase()} of ${entity.text}?`);
            }
        }
        return questions;
    }
}
