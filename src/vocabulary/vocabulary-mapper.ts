/**
 * Vocabulary Mapper
 *
 * Translates between the words accountants use ("employee", "vacation",
 * "time card") and the terms of the QuickBooks Time API ("user", "pto",
 * "timesheet"). Unknown terms always pass through unchanged.
 */

import type { JobcodeTypeFilter } from '../qbtime/types.js';

export type ServiceTerm =
  | 'user'
  | 'group'
  | 'jobcode'
  | 'pto'
  | 'regular'
  | 'paid_break'
  | 'unpaid_break'
  | 'timesheet';

const TO_SERVICE: ReadonlyMap<string, ServiceTerm> = new Map<string, ServiceTerm>([
  ['employee', 'user'],
  ['staff', 'user'],
  ['worker', 'user'],
  ['department', 'group'],
  ['team', 'group'],
  ['project', 'jobcode'],
  ['client', 'jobcode'],
  ['task', 'jobcode'],
  ['job', 'jobcode'],
  ['vacation', 'pto'],
  ['sick time', 'pto'],
  ['sick leave', 'pto'],
  ['paid time off', 'pto'],
  ['holiday', 'pto'],
  ['regular hours', 'regular'],
  ['standard time', 'regular'],
  ['break', 'paid_break'],
  ['lunch', 'unpaid_break'],
  ['time card', 'timesheet'],
  ['punch card', 'timesheet'],
  ['time entry', 'timesheet'],
  ['punch', 'timesheet'],
  ['hours worked', 'timesheet'],
]);

// jobcode stays "jobcode": project and client both land there, so the
// accounting meaning cannot be recovered without the caller's context.
const TO_ACCOUNTING: ReadonlyMap<ServiceTerm, string> = new Map<ServiceTerm, string>([
  ['user', 'employee'],
  ['group', 'department'],
  ['jobcode', 'jobcode'],
  ['pto', 'vacation'],
  ['regular', 'regular hours'],
  ['paid_break', 'break'],
  ['unpaid_break', 'lunch'],
  ['timesheet', 'time card'],
]);

const JOBCODE_TYPES: readonly JobcodeTypeFilter[] = ['regular', 'pto', 'paid_break', 'unpaid_break', 'all'];

// Longest phrase first so "sick time" wins over a shorter overlapping phrase
const PHRASES = [...TO_SERVICE.keys()].sort((a, b) => b.length - a.length);

function normalize(term: string): string {
  return term.trim().toLowerCase().replace(/\s+/g, ' ');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const PHRASE_PATTERN = new RegExp(`\\b(${PHRASES.map(escapeRegExp).join('|')})s?\\b`, 'gi');

export class VocabularyMapper {
  /**
   * Accounting term → service term. Unknown terms are returned as given.
   */
  toServiceTerm(term: string): string {
    return TO_SERVICE.get(normalize(term)) ?? term;
  }

  /**
   * Service term → accounting term. Lossy for jobcode, which maps to itself.
   */
  toAccountingTerm(serviceTerm: string): string {
    const key = normalize(serviceTerm);
    const match = [...TO_ACCOUNTING.entries()].find(([service]) => service === key);
    return match ? match[1] : serviceTerm;
  }

  /**
   * Replace every known accounting phrase inside free text
   */
  translateText(text: string): string {
    return text.replace(PHRASE_PATTERN, (phrase: string) => {
      const singular = TO_SERVICE.has(normalize(phrase)) ? phrase : phrase.slice(0, -1);
      return TO_SERVICE.get(normalize(singular)) ?? phrase;
    });
  }

  /**
   * Interpret a term as a jobcode type filter ("vacation" → "pto").
   * Returns undefined when the term names no jobcode type.
   */
  toJobcodeType(term: string): JobcodeTypeFilter | undefined {
    const candidate = normalize(this.toServiceTerm(term));
    return JOBCODE_TYPES.find((type) => type === candidate);
  }
}
