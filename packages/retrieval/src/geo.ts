import type { BoundingBox, GeoPoint } from "./types.js";

export const EARTH_RADIUS_KM = 6371;
export const CLUSTER_SIZE_KM = 100;

const KM_PER_DEGREE = (2 * Math.PI * EARTH_RADIUS_KM) / 360;

/** Angular size of one cluster cell, ≈ 0.8993°. */
export const CLUSTER_STEP_DEGREES = CLUSTER_SIZE_KM / KM_PER_DEGREE;

export interface ClusterCell {
  key: string;
  latIndex: number;
  lonIndex: number;
  /** Representative coordinate the cell's trending results are scored against. */
  center: GeoPoint;
}

function toRadians(degrees: number) {
  return (degrees * Math.PI) / 180;
}

/**
 * Great-circle distance in kilometres (haversine). Inputs are assumed to be
 * in range; validation happens at the HTTP boundary.
 */
export function distanceKm(a: GeoPoint, b: GeoPoint): number {
  const lat1 = toRadians(a.latitude);
  const lat2 = toRadians(b.latitude);
  const deltaLat = toRadians(b.latitude - a.latitude);
  const deltaLon = toRadians(b.longitude - a.longitude);

  const h =
    Math.sin(deltaLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(deltaLon / 2) ** 2;

  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

// Math.round sends x.5 towards +∞, so a point on a cell edge has one owner.
function cellIndex(degrees: number) {
  const index = Math.round(degrees / CLUSTER_STEP_DEGREES);
  return index === 0 ? 0 : index; // normalise -0
}

export function clusterCell(point: GeoPoint): ClusterCell {
  const latIndex = cellIndex(point.latitude);
  const lonIndex = cellIndex(point.longitude);
  return {
    key: `${latIndex}_${lonIndex}`,
    latIndex,
    lonIndex,
    center: {
      latitude: latIndex * CLUSTER_STEP_DEGREES,
      longitude: lonIndex * CLUSTER_STEP_DEGREES
    }
  };
}

export function clusterKey(latitude: number, longitude: number): string {
  return clusterCell({ latitude, longitude }).key;
}

export function isWithinRadius(
  center: GeoPoint,
  point: GeoPoint,
  radiusKm: number
): boolean {
  return distanceKm(center, point) <= radiusKm;
}

/**
 * Box that contains every point within `radiusKm` of `center`. Used only as a
 * coarse prefilter; near the poles or across the antimeridian the longitude
 * span opens to the full range.
 */
export function boundingBox(center: GeoPoint, radiusKm: number): BoundingBox {
  const latDelta = radiusKm / KM_PER_DEGREE;
  const minLatitude = Math.max(-90, center.latitude - latDelta);
  const maxLatitude = Math.min(90, center.latitude + latDelta);

  const widestLatitude = Math.max(Math.abs(minLatitude), Math.abs(maxLatitude));
  const cosine = Math.cos(toRadians(widestLatitude));
  const lonDelta = cosine > 1e-6 ? latDelta / cosine : 180;

  let minLongitude = center.longitude - lonDelta;
  let maxLongitude = center.longitude + lonDelta;
  if (lonDelta >= 180 || minLongitude < -180 || maxLongitude > 180) {
    minLongitude = -180;
    maxLongitude = 180;
  }

  return { minLatitude, maxLatitude, minLongitude, maxLongitude };
}

export function isInBoundingBox(box: BoundingBox, point: GeoPoint): boolean {
  return (
    point.latitude >= box.minLatitude &&
    point.latitude <= box.maxLatitude &&
    point.longitude >= box.minLongitude &&
    point.longitude <= box.maxLongitude
  );
}
