import type { Entity } from '../types/entity.js';

/**
 * Named entity recognition capability: text in, ordered (text, label)
 * pairs out.
 */
export interface EntityRecognizer {
    readonly name: string;
    recognize(text: string): Entity[] | Promise<Entity[]>;
}
