/**
 * Great-circle geometry for geofencing and walking directions.
 */

import type { GeoPoint } from "./types";

export const EARTH_RADIUS_METERS = 6371000;

/** Average wheelchair walking pace */
export const WALKING_METERS_PER_MINUTE = 66.7;

// Absorbs floating-point error so a rider exactly on the boundary counts as inside
const GEOFENCE_EPSILON_METERS = 1e-6;

const toRadians = (deg: number) => (deg * Math.PI) / 180;

export function haversineMeters(a: GeoPoint, b: GeoPoint): number {
  const phi1 = toRadians(a.lat);
  const phi2 = toRadians(b.lat);
  const dPhi = toRadians(b.lat - a.lat);
  const dLambda = toRadians(b.lon - a.lon);

  const h =
    Math.sin(dPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));

  return EARTH_RADIUS_METERS * c;
}

export function isWithinRadius(position: GeoPoint, center: GeoPoint, radiusMeters: number): boolean {
  return haversineMeters(position, center) <= radiusMeters + GEOFENCE_EPSILON_METERS;
}

const COMPASS = ["북쪽", "북동쪽", "동쪽", "남동쪽", "남쪽", "남서쪽", "서쪽", "북서쪽"] as const;

export type CompassDirection = (typeof COMPASS)[number];

/** Eight-point heading from `from` to `to`, in Korean */
export function compassDirection(from: GeoPoint, to: GeoPoint): CompassDirection {
  const angle = (Math.atan2(to.lon - from.lon, to.lat - from.lat) * 180) / Math.PI;
  // [-180, 180) → sector 0..7, sector 0 centred on north
  const sector = Math.floor(((((angle + 22.5) % 360) + 360) % 360) / 45);
  return COMPASS[sector] ?? "북쪽";
}

export function walkingMinutes(distanceMeters: number): number {
  return Math.max(1, Math.floor(distanceMeters / WALKING_METERS_PER_MINUTE));
}
