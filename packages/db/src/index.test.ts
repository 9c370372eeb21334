import { describe, expect, it } from 'vitest';
import * as db from './index.js';

describe('db index exports', () => {
  it('re-exports database setup, the run store and schema tables', () => {
    expect(typeof db.createDatabase).toBe('function');
    expect(typeof db.migrateDatabase).toBe('function');
    expect(typeof db.createSqliteRunStore).toBe('function');
    expect(db.workflowRuns).toBeDefined();
    expect(db.runSteps).toBeDefined();
  });
});
