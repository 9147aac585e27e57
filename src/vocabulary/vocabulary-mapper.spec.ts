import { VocabularyMapper } from './vocabulary-mapper.js';

describe('VocabularyMapper', () => {
  const mapper = new VocabularyMapper();

  it.each([
    ['employee', 'user'],
    ['department', 'group'],
    ['project', 'jobcode'],
    ['client', 'jobcode'],
    ['vacation', 'pto'],
    ['sick time', 'pto'],
    ['regular hours', 'regular'],
    ['time card', 'timesheet'],
    ['punch card', 'timesheet'],
  ])('should map %s to %s', (term, expected) => {
    expect(mapper.toServiceTerm(term)).toBe(expected);
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(mapper.toServiceTerm('  Sick   Time ')).toBe('pto');
    expect(mapper.toServiceTerm('EMPLOYEE')).toBe('user');
  });

  it('should pass unknown terms through unchanged', () => {
    expect(mapper.toServiceTerm('Mileage')).toBe('Mileage');
    expect(mapper.toAccountingTerm('locations')).toBe('locations');
  });

  it.each(['employee', 'department', 'vacation', 'time card'])('should round-trip %s', (term) => {
    expect(mapper.toAccountingTerm(mapper.toServiceTerm(term))).toBe(term);
  });

  it('should not recover project or client from jobcode', () => {
    expect(mapper.toAccountingTerm(mapper.toServiceTerm('project'))).toBe('jobcode');
    expect(mapper.toAccountingTerm(mapper.toServiceTerm('client'))).toBe('jobcode');
  });

  it('should translate phrases inside free text, plurals included', () => {
    expect(mapper.translateText('Hours for each employee on vacation')).toBe('Hours for each user on pto');
    expect(mapper.translateText('time cards by department')).toBe('timesheet by group');
    expect(mapper.translateText('breakdown of lunch')).toBe('breakdown of unpaid_break');
  });

  it('should prefer the longer phrase when phrases overlap', () => {
    expect(mapper.translateText('punch card totals')).toBe('timesheet totals');
  });

  it('should read jobcode types from accounting words', () => {
    expect(mapper.toJobcodeType('vacation')).toBe('pto');
    expect(mapper.toJobcodeType('Lunch')).toBe('unpaid_break');
    expect(mapper.toJobcodeType('all')).toBe('all');
    expect(mapper.toJobcodeType('employee')).toBeUndefined();
  });
});
