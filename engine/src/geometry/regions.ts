import type { GeoPoint } from "@fleetsight/shared";
import { GeometryLookupError } from "../errors.js";

export interface GeometryProvider {
  /** Throws when `regionRef` is unknown. */
  contains(regionRef: string, point: GeoPoint): boolean;
}

/** Closed ring of vertices; the last vertex connects back to the first. */
export type Polygon = readonly GeoPoint[];

export type RegionDefinition = {
  id: string;
  name?: string;
  polygons: readonly Polygon[];
};

/** Ray casting in the lat/lng plane; points on an edge may fall either way. */
export function pointInPolygon(point: GeoPoint, polygon: Polygon): boolean {
  let inside = false;
  const x = point.longitude;
  const y = point.latitude;

  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const a = polygon[i];
    const b = polygon[j];
    if (!a || !b) continue;
    const crosses = a.latitude > y !== b.latitude > y;
    if (crosses) {
      const xAtY = ((b.longitude - a.longitude) * (y - a.latitude)) / (b.latitude - a.latitude) + a.longitude;
      if (x < xAtY) inside = !inside;
    }
  }

  return inside;
}

export class RegionIndex implements GeometryProvider {
  private regions = new Map<string, RegionDefinition>();

  constructor(regions: readonly RegionDefinition[] = []) {
    for (const region of regions) this.register(region);
  }

  register(region: RegionDefinition): void {
    if (region.polygons.some((p) => p.length < 3)) {
      throw new Error(`Region ${region.id} has a polygon with fewer than 3 vertices`);
    }
    this.regions.set(region.id, region);
  }

  has(regionRef: string): boolean {
    return this.regions.has(regionRef);
  }

  contains(regionRef: string, point: GeoPoint): boolean {
    const region = this.regions.get(regionRef);
    if (!region) {
      throw new GeometryLookupError(regionRef, "unknown region");
    }
    return region.polygons.some((polygon) => pointInPolygon(point, polygon));
  }
}
