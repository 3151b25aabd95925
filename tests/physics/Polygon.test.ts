import { Vec2 } from "@/math/Vec2";
import {
  createPolygon,
  edgesOf,
  rotate,
  verticesOf,
  wallVelocityAt,
} from "@/physics/Polygon";
import { createTestPolygon } from "@test/helpers/simulationHelpers";
import { describe, expect, it } from "vitest";

describe("Polygon", () => {
  describe("createPolygon", () => {
    it("should copy the configured center", () => {
      const center = { x: 400, y: 300 };
      const polygon = createPolygon({ center, radius: 200, sides: 6, angle: 0, angularSpeed: 1 });
      expect(polygon.center).toEqual(center);
      expect(polygon.center).not.toBe(center);
    });
  });

  describe("verticesOf", () => {
    const hexagon = createTestPolygon({ center: { x: 400, y: 300 }, radius: 200 });

    it("should produce one vertex per side", () => {
      expect(verticesOf(hexagon)).toHaveLength(6);
      expect(verticesOf(createTestPolygon({ sides: 3 }))).toHaveLength(3);
    });

    it("should start at the rotation angle", () => {
      expect(verticesOf(hexagon)[0]).toEqual({ x: 600, y: 300 });
    });

    it("should place every vertex on the circumcircle", () => {
      for (const vertex of verticesOf(hexagon)) {
        expect(Vec2.distance(vertex, hexagon.center)).toBeCloseTo(200, 9);
      }
    });

    it("should space vertices by the side length of a regular polygon", () => {
      const vertices = verticesOf(hexagon);
      for (let i = 0; i < vertices.length; i++) {
        const next = vertices[(i + 1) % vertices.length];
        // Side of a regular hexagon equals its circumradius
        expect(Vec2.distance(vertices[i], next)).toBeCloseTo(200, 9);
      }
    });

    it("should follow the angle", () => {
      const rotated = createTestPolygon({ angle: Math.PI / 2 });
      const first = verticesOf(rotated)[0];
      expect(first.x).toBeCloseTo(0, 9);
      expect(first.y).toBeCloseTo(100, 9);
    });

    it("should return fresh arrays on every call", () => {
      expect(verticesOf(hexagon)).not.toBe(verticesOf(hexagon));
    });
  });

  describe("edgesOf", () => {
    it("should chain edges and wrap the last one to the first vertex", () => {
      const polygon = createTestPolygon();
      const vertices = verticesOf(polygon);
      const edges = edgesOf(polygon);

      expect(edges).toHaveLength(6);
      for (let i = 0; i < edges.length; i++) {
        expect(edges[i].start).toEqual(vertices[i]);
        expect(edges[i].end).toEqual(vertices[(i + 1) % 6]);
      }
    });

    it("should have edge perpendiculars pointing towards the center", () => {
      const polygon = createTestPolygon({ angle: 0.3 });
      for (const edge of edgesOf(polygon)) {
        const perp = Vec2.perpendicular(Vec2.subtract(edge.end, edge.start));
        const midpoint = Vec2.scale(Vec2.add(edge.start, edge.end), 0.5);
        expect(Vec2.dot(perp, Vec2.subtract(polygon.center, midpoint))).toBeGreaterThan(0);
      }
    });
  });

  describe("rotate", () => {
    it("should advance the angle by angularSpeed * dt", () => {
      const polygon = createTestPolygon({ angle: 1, angularSpeed: 0.5 });
      rotate(polygon, 2);
      expect(polygon.angle).toBe(2);
    });

    it("should keep the shape rigid", () => {
      const polygon = createTestPolygon({ angularSpeed: Math.PI / 4 });
      rotate(polygon, 0.37);
      const vertices = verticesOf(polygon);
      for (let i = 0; i < vertices.length; i++) {
        expect(Vec2.distance(vertices[i], polygon.center)).toBeCloseTo(100, 9);
        expect(Vec2.distance(vertices[i], vertices[(i + 1) % 6])).toBeCloseTo(100, 9);
      }
    });
  });

  describe("wallVelocityAt", () => {
    it("should compute ω × r about the center", () => {
      const polygon = createTestPolygon({ center: { x: 10, y: 10 }, angularSpeed: 2 });
      expect(wallVelocityAt(polygon, { x: 13, y: 14 })).toEqual({ x: -8, y: 6 });
    });

    it("should be perpendicular to the radius", () => {
      const polygon = createTestPolygon({ angularSpeed: -1.5 });
      const point = { x: 30, y: -70 };
      expect(Vec2.dot(wallVelocityAt(polygon, point), point)).toBe(0);
    });

    it("should be zero for a stationary polygon", () => {
      const polygon = createTestPolygon();
      expect(Vec2.length(wallVelocityAt(polygon, { x: 50, y: 50 }))).toBe(0);
    });
  });
});
