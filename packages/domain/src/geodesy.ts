import * as Cesium from 'cesium';
import type { Vector3 } from './entities/state-vector.js';
import { vectorNorm } from './entities/state-vector.js';

// Constants for Earth
export const EARTH_RADIUS_KM = 6371.0;
const M_PER_KM = 1000;

export interface GeodeticPosition {
  /** degrees, positive north */
  latitude: number;
  /** degrees in [-180, 180], positive east */
  longitude: number;
  /** km above the WGS-84 ellipsoid */
  altitude: number;
}

/** Height above a spherical Earth of mean radius. */
export function altitudeKm(position: Vector3): number {
  return vectorNorm(position) - EARTH_RADIUS_KM;
}

/**
 * Rotate an inertial position into the Earth-fixed frame about Z by the
 * Greenwich sidereal angle at `epochMs`.
 * Precession, nutation and polar motion are ignored.
 */
export function inertialToEarthFixed(position: Vector3, epochMs: number): Vector3 {
  const time = Cesium.JulianDate.fromDate(new Date(epochMs));
  const rotation = Cesium.Transforms.computeTemeToPseudoFixedMatrix(time);
  const fixed = Cesium.Matrix3.multiplyByVector(
    rotation,
    new Cesium.Cartesian3(position.x, position.y, position.z),
    new Cesium.Cartesian3(),
  );
  return { x: fixed.x, y: fixed.y, z: fixed.z };
}

/** Earth-fixed Cartesian (km) to WGS-84 latitude, longitude and height. */
export function earthFixedToGeodetic(ecef: Vector3): GeodeticPosition {
  const cartographic = Cesium.Cartographic.fromCartesian(
    new Cesium.Cartesian3(ecef.x * M_PER_KM, ecef.y * M_PER_KM, ecef.z * M_PER_KM),
  );
  // undefined only for a point at the Earth's centre
  if (!cartographic) {
    throw new RangeError(`no geodetic position for (${ecef.x}, ${ecef.y}, ${ecef.z}) km`);
  }
  return {
    latitude: Cesium.Math.toDegrees(cartographic.latitude),
    longitude: Cesium.Math.toDegrees(cartographic.longitude),
    altitude: cartographic.height / M_PER_KM,
  };
}

/** Ground position under an inertial position at the given epoch. */
export function inertialToGeodetic(position: Vector3, epochMs: number): GeodeticPosition {
  return earthFixedToGeodetic(inertialToEarthFixed(position, epochMs));
}
