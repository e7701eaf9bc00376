import test from 'node:test';
import assert from 'node:assert/strict';
import { createTraitsCapability } from '../capabilities/traits';
import { CapabilityRequestError } from '../errors';
import type { ModuleLogger } from '../logger';
import { createRecordingFetch } from './fetchStub';

function createMemoryLogger(): ModuleLogger & { entries: Array<{ level: string; message: string }> } {
  const entries: Array<{ level: string; message: string }> = [];
  return {
    entries,
    debug: (message) => entries.push({ level: 'debug', message }),
    info: (message) => entries.push({ level: 'info', message }),
    warn: (message) => entries.push({ level: 'warn', message }),
    error: (message) => entries.push({ level: 'error', message: String(message) })
  };
}

test('submitTraits posts the raw file with its content type and returns new trait ids', async () => {
  const { fetchImpl, calls } = createRecordingFetch(() => ({
    status: 201,
    body: { data: { ids_of_new_traits: [11, 12] } }
  }));
  const traits = createTraitsCapability({ baseUrl: 'http://bety.test/bety', key: 'test-key', fetchImpl });

  const ids = await traits.submitTraits({ content: 'site,trait\nplot,1\n', fileType: 'csv' });

  assert.deepEqual(ids, ['11', '12']);
  assert.equal(calls.length, 1);
  assert.equal(calls[0].method, 'POST');
  assert.equal(calls[0].url.pathname, '/bety/api/v1/traits.csv');
  assert.equal(calls[0].url.searchParams.get('key'), 'test-key');
  assert.equal(calls[0].headers.get('content-type'), 'text/csv');
  assert.equal(calls[0].body, 'site,trait\nplot,1\n');
});

test('submitTraits maps json and xml uploads to their content types', async () => {
  const { fetchImpl, calls } = createRecordingFetch(() => ({ body: { data: { ids_of_new_traits: [] } } }));
  const traits = createTraitsCapability({ baseUrl: 'http://bety.test', fetchImpl });

  await traits.submitTraits({ content: '{}', fileType: 'json' });
  await traits.submitTraits({ content: '<traits/>', fileType: 'XML' });

  assert.equal(calls[0].url.pathname, '/api/v1/traits.json');
  assert.equal(calls[0].headers.get('content-type'), 'application/json');
  assert.equal(calls[1].url.pathname, '/api/v1/traits.xml');
  assert.equal(calls[1].headers.get('content-type'), 'application/xml');
});

test('submitTraits rejects unsupported file types without a request', async () => {
  const { fetchImpl, calls } = createRecordingFetch(() => ({ body: {} }));
  const logger = createMemoryLogger();
  const traits = createTraitsCapability({ baseUrl: 'http://bety.test', fetchImpl, logger });

  const ids = await traits.submitTraits({ content: 'x', fileType: 'txt' });

  assert.equal(ids, null);
  assert.equal(calls.length, 0);
  assert.deepEqual(logger.entries, [{ level: 'error', message: 'Unsupported file type.' }]);
});

test('submitTraits treats 2xx statuses other than 200 and 201 as failures', async () => {
  const { fetchImpl } = createRecordingFetch(() => ({ status: 202, body: { data: { ids_of_new_traits: [] } } }));
  const traits = createTraitsCapability({ baseUrl: 'http://bety.test', fetchImpl });

  await assert.rejects(
    () => traits.submitTraits({ content: 'a\n', fileType: 'csv' }),
    (error) => {
      assert.ok(error instanceof CapabilityRequestError);
      assert.equal(error.status, 202);
      return true;
    }
  );
});

test('submitTraits logs and rethrows server errors', async () => {
  const { fetchImpl } = createRecordingFetch(() => ({ status: 400, body: { errors: ['bad row'] } }));
  const logger = createMemoryLogger();
  const traits = createTraitsCapability({ baseUrl: 'http://bety.test', fetchImpl, logger });

  await assert.rejects(() => traits.submitTraits({ content: 'a\n', fileType: 'csv' }), CapabilityRequestError);
  assert.deepEqual(logger.entries, [{ level: 'error', message: 'Error submitting data to BETYdb' }]);
});
