import type { LineSegment, Vector2 } from "@/types";
import { Vec2 } from "./Vec2";

/** Closest point on a segment together with its parameter along the segment */
export interface ClosestPoint {
  readonly point: Vector2;
  /** Position along segment (0-1) */
  readonly t: number;
}

/**
 * Segment - Pure utility functions for line segment operations
 */
export const Segment = {
  /**
   * Create a line segment from two points
   */
  create(start: Vector2, end: Vector2): LineSegment {
    return { start, end };
  },

  /**
   * Vector from start to end (not normalized)
   */
  vector(segment: LineSegment): Vector2 {
    return Vec2.subtract(segment.end, segment.start);
  },

  /**
   * Project a point onto the segment, clamped to its endpoints.
   * A zero-length segment yields its start point with t = 0.
   */
  closestPoint(segment: LineSegment, point: Vector2): ClosestPoint {
    const edge = Segment.vector(segment);
    const edgeLengthSq = Vec2.lengthSquared(edge);
    if (edgeLengthSq === 0) {
      return { point: segment.start, t: 0 };
    }

    const toPoint = Vec2.subtract(point, segment.start);
    const t = Vec2.clamp(Vec2.dot(toPoint, edge) / edgeLengthSq, 0, 1);
    return { point: Vec2.add(segment.start, Vec2.scale(edge, t)), t };
  },
};
