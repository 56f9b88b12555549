import { ValidationError } from '../errors.js';
import type { Feature, FeatureCollection, Geometry, GeometryType } from '../types/geojson.js';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const describeType = (value: unknown): string => {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
};

const isGeometryOf = <T extends GeometryType>(
  geometry: Record<string, unknown>,
  type: T,
): geometry is Geometry<T> => geometry.type === type;

/**
 * Check that `data` is a FeatureCollection whose every feature carries a
 * geometry of `geometryType`. Throws ValidationError with the first problem found.
 */
export function validateFeatureCollection<T extends GeometryType>(
  data: unknown,
  geometryType: T,
): FeatureCollection<T> {
  if (!isRecord(data)) {
    throw new ValidationError(`Expected GeoJSON FeatureCollection, got ${describeType(data)}`);
  }

  if (data.type !== 'FeatureCollection') {
    throw new ValidationError(`Expected type 'FeatureCollection', got '${String(data.type)}'`);
  }

  const features = 'features' in data ? data.features : [];
  if (!Array.isArray(features)) {
    throw new ValidationError('Features must be a list');
  }

  if (features.length === 0) {
    throw new ValidationError(`At least one ${geometryType} feature is required`);
  }

  const validated: Feature<T>[] = features.map((feature: unknown, idx) => {
    if (!isRecord(feature)) {
      throw new ValidationError(`Feature ${idx} must be an object`);
    }

    const geometry = feature.geometry;
    if (!isRecord(geometry) || geometry.type === undefined) {
      throw new ValidationError(`Feature ${idx} missing geometry`);
    }

    if (!isGeometryOf(geometry, geometryType)) {
      throw new ValidationError(
        `Expected geometry type '${geometryType}', got '${String(geometry.type)}' in feature ${idx}`,
      );
    }

    const properties = isRecord(feature.properties) ? feature.properties : null;
    return { ...feature, geometry, properties };
  });

  return { ...data, type: 'FeatureCollection', features: validated };
}
