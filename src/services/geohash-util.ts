const BASE32 = "0123456789bcdefghjkmnpqrstuvwxyz";

/**
 * Encode a coordinate pair as a base32 geohash.
 *
 * Latitude is clamped to [-90, 90] and longitude to [-180, 180]. The upper
 * latitude bound is nudged just inside the grid, and longitude 180 wraps to -180.
 */
export function encodeGeohash(
  latitude: number,
  longitude: number,
  precision = 7
): string {
  let lat = Math.max(Math.min(latitude, 90), -90);
  let lon = Math.max(Math.min(longitude, 180), -180);
  if (lat === 90) lat = 89.999999999;
  if (lon === 180) lon = -180;

  const latRange = [-90, 90];
  const lonRange = [-180, 180];
  let hash = "";
  let value = 0;
  let bitCount = 0;
  let isLon = true;

  while (hash.length < precision) {
    const range = isLon ? lonRange : latRange;
    const coord = isLon ? lon : lat;
    const mid = (range[0] + range[1]) / 2;

    value <<= 1;
    if (coord >= mid) {
      value |= 1;
      range[0] = mid;
    } else {
      range[1] = mid;
    }

    isLon = !isLon;
    if (++bitCount === 5) {
      hash += BASE32[value];
      value = 0;
      bitCount = 0;
    }
  }

  return hash;
}
