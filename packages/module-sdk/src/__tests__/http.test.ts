import test from 'node:test';
import assert from 'node:assert/strict';
import { buildUrl, httpRequest } from '../internal/http';
import { CapabilityRequestError } from '../errors';
import { createRecordingFetch } from './fetchStub';

test('buildUrl joins base and path and skips empty query values', () => {
  const url = buildUrl('http://store.test/clowder/', '/api/geostreams/sensors', {
    sensor_name: 'Range 1 Column 2',
    limit: undefined,
    page: null
  });
  assert.equal(url, 'http://store.test/clowder/api/geostreams/sensors?sensor_name=Range+1+Column+2');
});

test('httpRequest appends the api key and encodes JSON bodies', async () => {
  const { fetchImpl, calls } = createRecordingFetch(() => ({ status: 201, body: { id: 7 } }));
  const response = await httpRequest<{ id: number }>({
    baseUrl: 'http://store.test',
    path: '/api/geostreams/sensors',
    method: 'post',
    body: { name: 'plot' },
    apiKey: ' test-key ',
    expectJson: true,
    fetchImpl
  });

  assert.equal(response.status, 201);
  assert.deepEqual(response.data, { id: 7 });
  assert.equal(calls.length, 1);
  assert.equal(calls[0].method, 'POST');
  assert.equal(calls[0].url.searchParams.get('key'), 'test-key');
  assert.equal(calls[0].headers.get('content-type'), 'application/json');
  assert.equal(calls[0].headers.get('accept'), 'application/json');
  assert.equal(calls[0].body, '{"name":"plot"}');
});

test('httpRequest sends raw bodies untouched with caller headers', async () => {
  const { fetchImpl, calls } = createRecordingFetch(() => ({ status: 200, body: {} }));
  await httpRequest({
    baseUrl: 'http://bety.test',
    path: '/api/v1/traits.csv',
    method: 'POST',
    body: 'a,b\n1,2\n',
    headers: { 'content-type': 'text/csv' },
    fetchImpl
  });

  assert.equal(calls[0].headers.get('content-type'), 'text/csv');
  assert.equal(calls[0].body, 'a,b\n1,2\n');
  assert.equal(calls[0].url.searchParams.has('key'), false);
});

test('httpRequest raises CapabilityRequestError with the key redacted', async () => {
  const { fetchImpl } = createRecordingFetch(() => ({ status: 503, body: 'unavailable' }));
  await assert.rejects(
    () =>
      httpRequest({
        baseUrl: 'http://store.test',
        path: '/api/geostreams/streams',
        method: 'GET',
        query: { stream_name: 'height' },
        apiKey: 'test-secret',
        fetchImpl
      }),
    (error) => {
      assert.ok(error instanceof CapabilityRequestError);
      assert.equal(error.status, 503);
      assert.equal(error.method, 'GET');
      assert.equal(error.code, 'http_error');
      assert.equal(error.responseBody, 'unavailable');
      assert.equal(error.url, 'http://store.test/api/geostreams/streams?stream_name=height&key=redacted');
      return true;
    }
  );
});

test('httpRequest leaves data undefined for non-JSON payloads', async () => {
  const { fetchImpl } = createRecordingFetch(() => ({ status: 200, body: 'not json' }));
  const response = await httpRequest({
    baseUrl: 'http://store.test',
    path: '/',
    method: 'GET',
    expectJson: true,
    fetchImpl
  });
  assert.equal(response.data, undefined);
});
