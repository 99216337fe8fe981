/**
 * Decodes an encoded polyline (Google algorithm, precision 5) into
 * [lat, lon] pairs. openrouteservice uses the same encoding for 2D geometry.
 */
export function decodePolyline(encoded: string, precision = 5): [number, number][] {
  const factor = 10 ** precision;
  const points: [number, number][] = [];
  let index = 0;
  let lat = 0;
  let lon = 0;

  const nextValue = (): number => {
    let shift = 0;
    let result = 0;
    let byte: number;
    do {
      if (index >= encoded.length) throw new Error('Truncated polyline');
      byte = encoded.charCodeAt(index++) - 63;
      if (byte < 0 || byte > 0x3f) throw new Error(`Invalid polyline character at ${index - 1}`);
      result |= (byte & 0x1f) << shift;
      shift += 5;
    } while (byte >= 0x20);
    return result & 1 ? ~(result >> 1) : result >> 1;
  };

  while (index < encoded.length) {
    lat += nextValue();
    lon += nextValue();
    points.push([lat / factor, lon / factor]);
  }
  return points;
}
