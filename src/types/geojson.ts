// Only the parts of GeoJSON the pipeline inspects are typed; everything else
// rides along untouched.

export type GeometryType =
  | 'Point'
  | 'MultiPoint'
  | 'LineString'
  | 'MultiLineString'
  | 'Polygon'
  | 'MultiPolygon'
  | 'GeometryCollection';

export interface Geometry<T extends GeometryType = GeometryType> {
  type: T;
  [key: string]: unknown;
}

export interface Feature<T extends GeometryType = GeometryType> {
  type?: unknown;
  geometry: Geometry<T>;
  properties?: Record<string, unknown> | null;
  [key: string]: unknown;
}

export interface FeatureCollection<T extends GeometryType = GeometryType> {
  type: 'FeatureCollection';
  features: Feature<T>[];
  [key: string]: unknown;
}

export type SiteCollection = FeatureCollection<'Polygon'>;
export type RoadCollection = FeatureCollection<'LineString'>;
