import { Coordinates } from '@/types';

const EARTH_RADIUS_METERS = 6371e3;

/**
 * Calculate geodesic distance between two coordinates using Haversine formula
 */
export function calculateGeodesicDistance(
  coord1: Coordinates,
  coord2: Coordinates
): number {
  const φ1 = (coord1.lat * Math.PI) / 180;
  const φ2 = (coord2.lat * Math.PI) / 180;
  const Δφ = ((coord2.lat - coord1.lat) * Math.PI) / 180;
  const Δλ = ((coord2.lng - coord1.lng) * Math.PI) / 180;

  const a = Math.sin(Δφ / 2) * Math.sin(Δφ / 2) +
            Math.cos(φ1) * Math.cos(φ2) *
            Math.sin(Δλ / 2) * Math.sin(Δλ / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_METERS * c; // Distance in meters
}

/**
 * Calculate destination coordinate given start point, bearing and distance
 */
export function calculateDestination(
  start: Coordinates,
  bearing: number,
  distance: number
): Coordinates {
  const δ = distance / EARTH_RADIUS_METERS; // Angular distance
  const θ = (bearing * Math.PI) / 180;

  const φ1 = (start.lat * Math.PI) / 180;
  const λ1 = (start.lng * Math.PI) / 180;

  const φ2 = Math.asin(
    Math.sin(φ1) * Math.cos(δ) +
    Math.cos(φ1) * Math.sin(δ) * Math.cos(θ)
  );

  const λ2 = λ1 + Math.atan2(
    Math.sin(θ) * Math.sin(δ) * Math.cos(φ1),
    Math.cos(δ) - Math.sin(φ1) * Math.sin(φ2)
  );

  return {
    lat: (φ2 * 180) / Math.PI,
    lng: ((λ2 * 180) / Math.PI + 540) % 360 - 180 // Normalize longitude
  };
}

/**
 * Validate coordinate values
 */
export function validateCoordinates(coords: Coordinates): boolean {
  return (
    Number.isFinite(coords.lat) &&
    Number.isFinite(coords.lng) &&
    coords.lat >= -90 &&
    coords.lat <= 90 &&
    coords.lng >= -180 &&
    coords.lng <= 180
  );
}

/**
 * Human-readable distance: whole meters below 1 km, one decimal in km above.
 */
export function formatDistance(meters: number): string {
  if (meters < 1000) {
    return `${Math.floor(meters)}m`;
  }
  return `${(meters / 1000).toFixed(1)} km`;
}
