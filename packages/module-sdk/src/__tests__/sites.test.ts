import test from 'node:test';
import assert from 'node:assert/strict';
import { createSitesCapability } from '../capabilities/sites';
import { createRecordingFetch } from './fetchStub';

const SITES = {
  data: [
    { site: { id: 5, sitename: 'MAC Field Scanner Season 2 Range 1 Column 1', geometry: 'POLYGON((0 0,1 0,1 1,0 0))' } },
    { site: { id: 6, sitename: 'MAC Field Scanner Season 3 Range 1 Column 1', geometry: 'POLYGON((0 0,2 0,2 2,0 0))' } },
    { site: { id: 7, sitename: '', geometry: 'POINT(1 1)' } }
  ]
};

const EXPERIMENTS = {
  data: [
    {
      experiment: {
        start_date: '2016-08-01',
        end_date: '2016-12-31',
        sites: [{ site: { id: 5 } }]
      }
    },
    {
      experiment: {
        start_date: '2017-01-01',
        end_date: '2017-06-30',
        sites: [{ site: { id: 6 } }]
      }
    }
  ]
};

test('findSitesByLatLon queries sites containing the coordinate', async () => {
  const { fetchImpl, calls } = createRecordingFetch(() => ({ body: SITES }));
  const sites = createSitesCapability({ baseUrl: 'http://bety.test/bety', key: 'test-key', fetchImpl });

  const candidates = await sites.findSitesByLatLon({ lat: 33.07, lon: -111.97 });

  assert.equal(calls.length, 1);
  assert.equal(calls[0].url.pathname, '/bety/api/v1/sites');
  assert.equal(calls[0].url.searchParams.get('containing'), '33.07,-111.97');
  assert.equal(calls[0].url.searchParams.get('limit'), 'none');
  assert.deepEqual(
    candidates.map((candidate) => candidate.sitename),
    ['MAC Field Scanner Season 2 Range 1 Column 1', 'MAC Field Scanner Season 3 Range 1 Column 1']
  );
});

test('findSitesByLatLon keeps only sites of experiments running on the filter date', async () => {
  const { fetchImpl, calls } = createRecordingFetch((request) => ({
    body: request.url.pathname.endsWith('/experiments') ? EXPERIMENTS : SITES
  }));
  const sites = createSitesCapability({ baseUrl: 'http://bety.test', fetchImpl });

  const candidates = await sites.findSitesByLatLon({ lat: 33.07, lon: -111.97 }, '2017-01-25');

  assert.equal(calls.length, 2);
  assert.equal(calls[1].url.searchParams.get('associations_mode'), 'full_info');
  assert.deepEqual(candidates, [
    {
      id: '6',
      sitename: 'MAC Field Scanner Season 3 Range 1 Column 1',
      geometry: 'POLYGON((0 0,2 0,2 2,0 0))'
    }
  ]);
});

test('findSitesByLatLon skips the experiment query when no site contains the point', async () => {
  const { fetchImpl, calls } = createRecordingFetch(() => ({ body: { data: [] } }));
  const sites = createSitesCapability({ baseUrl: 'http://bety.test', fetchImpl });

  const candidates = await sites.findSitesByLatLon({ lat: 0, lon: 0 }, '2017-01-25');

  assert.deepEqual(candidates, []);
  assert.equal(calls.length, 1);
});
