import { Vec2 } from "@/math/Vec2";
import type { LineSegment, Polygon, PolygonConfig, Vector2 } from "@/types";

/**
 * Build a polygon from its configuration
 */
export function createPolygon(config: PolygonConfig): Polygon {
  return {
    center: { ...config.center },
    radius: config.radius,
    sides: config.sides,
    angle: config.angle,
    angularSpeed: config.angularSpeed,
  };
}

/**
 * Current vertex positions, counter-clockwise in angle starting at `polygon.angle`.
 *
 * Recomputed on every call: the angle changes each frame and `sides` is small.
 */
export function verticesOf(polygon: Polygon): Vector2[] {
  const vertices: Vector2[] = [];
  for (let i = 0; i < polygon.sides; i++) {
    const a = polygon.angle + (2 * Math.PI * i) / polygon.sides;
    vertices.push({
      x: polygon.center.x + polygon.radius * Math.cos(a),
      y: polygon.center.y + polygon.radius * Math.sin(a),
    });
  }
  return vertices;
}

/**
 * Edges of a vertex loop. Edge i runs from vertex i to vertex (i + 1) mod n.
 */
export function edgesFromVertices(vertices: readonly Vector2[]): LineSegment[] {
  const edges: LineSegment[] = [];
  for (let i = 0; i < vertices.length; i++) {
    edges.push({ start: vertices[i], end: vertices[(i + 1) % vertices.length] });
  }
  return edges;
}

export function edgesOf(polygon: Polygon): LineSegment[] {
  return edgesFromVertices(verticesOf(polygon));
}

/**
 * Advance the rotation angle. The angle is left unbounded.
 */
export function rotate(polygon: Polygon, dt: number): void {
  polygon.angle += polygon.angularSpeed * dt;
}

/**
 * Linear velocity of a point rigidly attached to the rotating polygon (ω × r).
 */
export function wallVelocityAt(polygon: Polygon, point: Vector2): Vector2 {
  const r = Vec2.subtract(point, polygon.center);
  return { x: -polygon.angularSpeed * r.y, y: polygon.angularSpeed * r.x };
}
