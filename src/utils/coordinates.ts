// (0, 0) is the "unknown" sentinel; a real fix at exactly 0° on either axis is
// treated as unknown as well.
export const hasCoordinates = (latitude: number, longitude: number) =>
  latitude !== 0 && longitude !== 0;

export const isUnknownLocation = (latitude: number, longitude: number) =>
  latitude === 0 && longitude === 0;
