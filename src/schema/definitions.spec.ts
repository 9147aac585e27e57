import { ENTITIES, ENUMS, getSchema } from './definitions.js';

describe('getSchema', () => {
  it('should return an entity by name, ignoring case', () => {
    const result = getSchema({ entity: 'jobcode' });
    expect(result.entity?.name).toBe('Jobcode');
    expect(result.entity?.fields.find((field) => field.name === 'type')?.enum_values).toEqual([
      'regular',
      'pto',
      'paid_break',
      'unpaid_break',
    ]);
  });

  it('should list the known entities when one is not found', () => {
    expect(getSchema({ entity: 'Invoice' })).toEqual({ available_entities: ENTITIES.map((e) => e.name) });
  });

  it('should return an enum by name', () => {
    expect(getSchema({ enum: 'rate_source' }).enum?.values.map((v) => v.value)).toEqual([
      'qbtime_api',
      'config_file',
      'config_default',
      'env_default',
    ]);
  });

  it('should expand a category into its entities and enums', () => {
    const [people] = getSchema({ category: 'people' }).categories ?? [];
    expect(people.entities?.map((e) => e.name)).toEqual(['User', 'Group']);
    expect(people.enums?.map((e) => e.name)).toEqual(['pay_interval']);
  });

  it('should give an overview with no arguments', () => {
    const result = getSchema({});
    expect(result.categories?.map((c) => c.name)).toEqual(['time_tracking', 'people', 'jobcodes', 'reports', 'resolution']);
    expect(result.available_enums).toEqual(ENUMS.map((e) => e.name));
  });
});
