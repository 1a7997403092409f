import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  createProcessEnvironment,
  createRecordEnvironment,
} from '../../src/adapters/environment/environment.ts';

describe('environment', () => {
  describe('createRecordEnvironment', () => {
    it('should expose the given variables', () => {
      const env = createRecordEnvironment({ APP_NUM: '2', EMPTY: '' });

      assert.strictEqual(env.has('APP_NUM'), true);
      assert.strictEqual(env.get('APP_NUM'), '2');
      assert.strictEqual(env.has('EMPTY'), true);
      assert.strictEqual(env.get('EMPTY'), '');
    });

    it('should treat undefined values as absent', () => {
      const env = createRecordEnvironment({ UNSET: undefined });

      assert.strictEqual(env.has('UNSET'), false);
      assert.strictEqual(env.get('UNSET'), undefined);
    });

    it('should not follow later changes to the record', () => {
      const record: Record<string, string> = { A: '1' };
      const env = createRecordEnvironment(record);
      record['A'] = '2';
      record['B'] = '3';

      assert.strictEqual(env.get('A'), '1');
      assert.strictEqual(env.has('B'), false);
    });
  });

  describe('createProcessEnvironment', () => {
    it('should take a snapshot of process.env', () => {
      const key = 'SETTINGS_TREE_ENV_TEST';
      process.env[key] = 'before';
      try {
        const env = createProcessEnvironment();
        process.env[key] = 'after';

        assert.strictEqual(env.get(key), 'before');
      } finally {
        delete process.env[key];
      }
    });
  });
});
