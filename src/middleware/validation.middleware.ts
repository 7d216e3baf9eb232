import { Request, Response, NextFunction } from 'express';
import { IWeatherQuery } from '@/types';
import { ValidationError } from '@/utils/errors';

const parseCoordinate = (
  raw: unknown,
  name: string,
  limit: number,
): number => {
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : NaN;
  if (!Number.isFinite(value) || value < -limit || value > limit) {
    throw new ValidationError(
      `Invalid ${name}. Must be a number between -${limit} and ${limit}.`,
    );
  }
  return value;
};

// Builds the aggregation query from /weather/:city[?lat=..&long=..]
export const validateWeatherRequest = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  const city = (req.params.city ?? '').trim();
  if (!city) {
    return next(new ValidationError('Missing required path segment: city'));
  }

  const { lat, long } = req.query;
  const query: IWeatherQuery = { city, latitude: 0, longitude: 0 };

  if (lat !== undefined || long !== undefined) {
    if (lat === undefined || long === undefined) {
      return next(
        new ValidationError('lat and long must be provided together.'),
      );
    }
    try {
      query.latitude = parseCoordinate(lat, 'lat', 90);
      query.longitude = parseCoordinate(long, 'long', 180);
    } catch (error) {
      return next(error);
    }
  }

  res.locals.weatherQuery = query;
  next();
};
