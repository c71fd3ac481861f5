export type { EntityRecognizer } from './recognizer.js';
export { CompromiseRecognizer } from './compromise.js';
export { EntityObserver } from './observer.js';
