/**
 * Circle Controller: computes circle polygons for posted location sets
 * and for the bundled reference set.
 */

import type { Request, Response } from 'express';
import type { AppConfig } from '../config.js';
import type { ComputeCirclesBody, ComputeFlatCirclesBody, ReferenceQuery } from '../types/index.js';
import {
  computeCircles,
  computeFlatCircles,
  loadLocations,
  type CircleComputation,
  type CircleResult,
} from '../services/circle/index.js';

export interface CircleFeatureProperties {
  id: number;
  crossesAntimeridian: boolean;
  batchCount: number;
  pointCount: number;
}

export interface CircleFeatureCollection {
  type: 'FeatureCollection';
  features: GeoJSON.Feature<GeoJSON.Polygon | GeoJSON.MultiPolygon, CircleFeatureProperties>[];
  errors: CircleComputation['errors'];
}

export function toFeature(
  circle: CircleResult
): GeoJSON.Feature<GeoJSON.Polygon | GeoJSON.MultiPolygon, CircleFeatureProperties> {
  return {
    type: 'Feature',
    geometry: circle.polygon.geometry,
    properties: {
      id: circle.id,
      crossesAntimeridian: circle.crossings.length > 0,
      batchCount: circle.geometry.kind === 'single' ? 1 : circle.geometry.batches.length,
      pointCount: circle.points.length,
    },
  };
}

export function toFeatureCollection(result: CircleComputation): CircleFeatureCollection {
  return {
    type: 'FeatureCollection',
    features: result.circles.map(toFeature),
    errors: result.errors,
  };
}

export function createCircleController(config: AppConfig) {
  async function computeSphericalCircles(req: Request, res: Response) {
    const body = req.body as ComputeCirclesBody;
    const params = {
      pointCount: body.pointCount ?? config.circle.pointCount,
      earthRadius: body.earthRadius ?? config.circle.earthRadius,
      crossingLatitude: body.crossingLatitude ?? config.circle.crossingLatitude,
    };

    const result = await computeCircles(body.locations, params);
    res.json(toFeatureCollection(result));
  }

  async function computePlaneCircles(req: Request, res: Response) {
    const body = req.body as ComputeFlatCirclesBody;
    const params = {
      pointCount: body.pointCount ?? config.flatCircle.pointCount,
      rescaleDivisor: body.rescaleDivisor ?? config.flatCircle.rescaleDivisor,
    };

    const result = await computeFlatCircles(body.locations, params);
    res.json(toFeatureCollection(result));
  }

  async function getReferenceCircles(req: Request, res: Response) {
    const query = req.query as ReferenceQuery;
    const locations = await loadLocations(config.locationsFile);
    const params = {
      ...config.circle,
      crossingLatitude: query.crossingLatitude ?? config.circle.crossingLatitude,
    };

    const result = await computeCircles(locations, params);
    res.json(toFeatureCollection(result));
  }

  return { computeSphericalCircles, computePlaneCircles, getReferenceCircles };
}
