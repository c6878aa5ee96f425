import { describe, it, expect } from 'vitest';
import { findMissingTables } from '../checkDb.js';

describe('findMissingTables', () => {
  it('should report nothing when both tables exist', () => {
    expect(findMissingTables(['medical_records', 'schema_migrations', 'users'])).toEqual([]);
  });

  it('should name each missing table', () => {
    expect(findMissingTables(['users'])).toEqual(['medical_records']);
    expect(findMissingTables([])).toEqual(['users', 'medical_records']);
  });
});
