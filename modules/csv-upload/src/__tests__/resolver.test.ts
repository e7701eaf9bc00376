import test from 'node:test';
import assert from 'node:assert/strict';
import { resolveSites, type SensorDefaults } from '../runtime/resolver';
import { createFakeGeostreams, createFakeSites } from './fakeStore';

const SENSOR: SensorDefaults = {
  region: 'Maricopa',
  type: { id: 'MAC Field Scanner', title: 'MAC Field Scanner', sensorType: 4 }
};

const SITE_WKT = 'POLYGON((0 0,1 0,1 1,0 0))';
const SITE_GEOMETRY = {
  type: 'Polygon',
  coordinates: [
    [
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 0]
    ]
  ]
};

test('a known plot name short-circuits the site lookup', async () => {
  const geostreams = createFakeGeostreams({
    sensors: [{ id: '7', name: 'Range 1 Column 2', geometry: { type: 'Point', coordinates: [1, 2] } }]
  });
  const sites = createFakeSites([{ id: '1', sitename: 'other', geometry: SITE_WKT }]);

  const matched = await resolveSites(
    { geostreams, sites, sensor: SENSOR },
    { plotName: 'Range 1 Column 2', latLon: { lat: 33.07, lon: -111.97 }, filterDate: '2017-01-25' }
  );

  assert.deepEqual([...matched], [['7', { name: 'Range 1 Column 2', geometry: { type: 'Point', coordinates: [1, 2] } }]]);
  assert.equal(sites.lookups.length, 0);
  assert.deepEqual(geostreams.calls, ['findSensor:Range 1 Column 2']);
});

test('an unknown plot name falls back to the location lookup', async () => {
  const geostreams = createFakeGeostreams();
  const sites = createFakeSites([{ id: '1', sitename: 'Season 2 Range 1', geometry: SITE_WKT }]);

  const matched = await resolveSites(
    { geostreams, sites, sensor: SENSOR },
    { plotName: 'missing plot', latLon: { lat: 33.07, lon: -111.97 }, filterDate: '2017-01-25' }
  );

  assert.deepEqual(sites.lookups, [{ latLon: { lat: 33.07, lon: -111.97 }, filterDate: '2017-01-25' }]);
  assert.deepEqual(geostreams.calls, [
    'findSensor:missing plot',
    'findSensor:Season 2 Range 1',
    'createSensor:Season 2 Range 1'
  ]);
  assert.deepEqual([...matched.keys()], ['sensor-1']);
});

test('site sensors are created once with the configured metadata and reused afterwards', async () => {
  const geostreams = createFakeGeostreams();
  const sites = createFakeSites([{ id: '1', sitename: 'Season 2 Range 1', geometry: SITE_WKT }]);
  const deps = { geostreams, sites, sensor: SENSOR };
  const input = { latLon: { lat: 33.07, lon: -111.97 }, filterDate: null };

  const first = await resolveSites(deps, input);
  const second = await resolveSites(deps, input);

  assert.deepEqual([...first], [['sensor-1', { name: 'Season 2 Range 1', geometry: SITE_GEOMETRY }]]);
  assert.deepEqual([...second], [...first]);
  assert.equal(geostreams.sensors.length, 1);
  assert.deepEqual(geostreams.sensorInputs, [
    { name: 'Season 2 Range 1', geometry: SITE_GEOMETRY, sensorType: SENSOR.type, region: 'Maricopa' }
  ]);
});

test('every candidate site is resolved in order', async () => {
  const geostreams = createFakeGeostreams({
    sensors: [{ id: '40', name: 'Season 3 Range 1', geometry: null }]
  });
  const sites = createFakeSites([
    { id: '1', sitename: 'Season 2 Range 1', geometry: SITE_WKT },
    { id: '2', sitename: 'Season 3 Range 1', geometry: 'POINT(5 6)' }
  ]);

  const matched = await resolveSites({ geostreams, sites, sensor: SENSOR }, { latLon: { lat: 0, lon: 0 } });

  assert.deepEqual([...matched.entries()], [
    ['sensor-1', { name: 'Season 2 Range 1', geometry: SITE_GEOMETRY }],
    ['40', { name: 'Season 3 Range 1', geometry: { type: 'Point', coordinates: [5, 6] } }]
  ]);
});

test('no plot name and no site yields an empty mapping', async () => {
  const geostreams = createFakeGeostreams();
  const matched = await resolveSites(
    { geostreams, sites: createFakeSites(), sensor: SENSOR },
    { latLon: { lat: 0, lon: 0 }, filterDate: '2017-01-25' }
  );
  assert.equal(matched.size, 0);
  assert.deepEqual(geostreams.calls, []);
});

test('lookup failures propagate to the caller', async () => {
  const geostreams = createFakeGeostreams({ failWhen: (operation) => operation === 'createSensor' });
  const sites = createFakeSites([{ id: '1', sitename: 'Season 2 Range 1', geometry: SITE_WKT }]);

  await assert.rejects(
    () => resolveSites({ geostreams, sites, sensor: SENSOR }, { latLon: { lat: 0, lon: 0 } }),
    { name: 'CapabilityRequestError', status: 500 }
  );
});
