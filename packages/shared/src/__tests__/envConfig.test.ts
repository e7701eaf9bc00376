import test from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { EnvConfigError, integerVar, jsonVar, loadEnvConfig, stringVar } from '../envConfig';

const schema = z.object({
  STORE_URL: stringVar({ defaultValue: 'http://127.0.0.1:9000' }),
  STORE_KEY: stringVar(),
  TIMEOUT_MS: integerVar({ min: 1 }),
  TAGS: jsonVar({ schema: z.array(z.string()) })
});

test('loadEnvConfig applies defaults and treats blanks as unset', () => {
  const config = loadEnvConfig(schema, { env: { STORE_KEY: '   ', TIMEOUT_MS: '2500' } });
  assert.deepEqual(config, {
    STORE_URL: 'http://127.0.0.1:9000',
    STORE_KEY: undefined,
    TIMEOUT_MS: 2500
  });
});

test('loadEnvConfig trims strings and parses JSON through the nested schema', () => {
  const config = loadEnvConfig(schema, {
    env: { STORE_URL: ' http://store.test ', TAGS: '["a","b"]' }
  });
  assert.equal(config.STORE_URL, 'http://store.test');
  assert.deepEqual(config.TAGS, ['a', 'b']);
});

test('loadEnvConfig reports every invalid variable under the context label', () => {
  assert.throws(
    () => loadEnvConfig(schema, { env: { TIMEOUT_MS: '0', TAGS: '{' }, context: 'uploader' }),
    (error) => {
      assert.ok(error instanceof EnvConfigError);
      const lines = error.message.split('\n');
      assert.equal(lines[0], '[uploader] Invalid environment configuration');
      assert.equal(lines[1], '  - TIMEOUT_MS: TIMEOUT_MS must be >= 1');
      assert.match(lines[2], /^ {2}- TAGS: Failed to parse TAGS as JSON \(/);
      return true;
    }
  );
});

test('required variables fail when missing', () => {
  const requiredSchema = z.object({ API_KEY: stringVar({ required: true, description: 'API key' }) });
  assert.throws(() => loadEnvConfig(requiredSchema, { env: {} }), /API_KEY: Missing required API key/);
});

test('integer variables reject values with trailing characters', () => {
  for (const raw of ['10abc', '1.5', '1e3']) {
    assert.throws(
      () => loadEnvConfig(schema, { env: { TIMEOUT_MS: raw } }),
      (error) => {
        assert.ok(error instanceof EnvConfigError);
        assert.equal(
          error.message,
          '[csv-upload] Invalid environment configuration\n  - TIMEOUT_MS: Expected TIMEOUT_MS to be an integer'
        );
        return true;
      }
    );
  }
  assert.equal(loadEnvConfig(schema, { env: { TIMEOUT_MS: ' 42 ' } }).TIMEOUT_MS, 42);
});
