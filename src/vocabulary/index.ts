/**
 * Vocabulary Module
 */

export { VocabularyMapper } from './vocabulary-mapper.js';
export type { ServiceTerm } from './vocabulary-mapper.js';
