import { z } from 'zod';
import type { Geometry, GeometryCollection } from 'geojson';
import { Geometry as WkxGeometry } from 'wkx';
import { describeError } from '@fieldtraits/module-sdk';

const positionSchema = z.array(z.number().finite()).min(2);

const pointSchema = z.object({ type: z.literal('Point'), coordinates: positionSchema });
const multiPointSchema = z.object({ type: z.literal('MultiPoint'), coordinates: z.array(positionSchema) });
const lineStringSchema = z.object({ type: z.literal('LineString'), coordinates: z.array(positionSchema) });
const multiLineStringSchema = z.object({
  type: z.literal('MultiLineString'),
  coordinates: z.array(z.array(positionSchema))
});
const polygonSchema = z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(positionSchema)) });
const multiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(z.array(positionSchema)))
});

const geometryCollectionSchema: z.ZodType<GeometryCollection, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({ type: z.literal('GeometryCollection'), geometries: z.array(geometrySchema) })
);

/** GeoJSON geometry, used for configured overrides and for converted site boundaries. */
export const geometrySchema: z.ZodType<Geometry, z.ZodTypeDef, unknown> = z.union([
  pointSchema,
  multiPointSchema,
  lineStringSchema,
  multiLineStringSchema,
  polygonSchema,
  multiPolygonSchema,
  geometryCollectionSchema
]);

export class GeometryConversionError extends Error {
  readonly wkt: string;

  constructor(wkt: string, message: string) {
    super(message);
    this.name = 'GeometryConversionError';
    this.wkt = wkt;
  }
}

/** Converts Well-Known Text (EWKT with an SRID prefix included) into a GeoJSON geometry. */
export function wktToGeoJson(wkt: string): Geometry {
  let converted: unknown;
  try {
    converted = WkxGeometry.parse(wkt).toGeoJSON();
  } catch (error) {
    throw new GeometryConversionError(wkt, `Unable to parse WKT geometry: ${describeError(error)}`);
  }

  const result = geometrySchema.safeParse(converted);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new GeometryConversionError(
      wkt,
      `WKT geometry did not convert to valid GeoJSON: ${issue?.message ?? 'unknown issue'}`
    );
  }
  return result.data;
}
