import { Segment } from "@/math/Segment";
import { Vec2 } from "@/math/Vec2";
import type {
  Ball,
  ContactFeature,
  ContactMode,
  ContactReport,
  LineSegment,
  Polygon,
  SimulationConstants,
  Vector2,
} from "@/types";
import { edgesFromVertices, verticesOf, wallVelocityAt } from "./Polygon";

/** Normal used when the ball center sits exactly on a vertex */
export const VERTEX_FALLBACK_NORMAL: Vector2 = { x: 0, y: -1 };

/**
 * Geometric overlap between the ball and one feature, before any response.
 */
interface ContactCandidate {
  readonly feature: ContactFeature;
  readonly index: number;
  readonly point: Vector2;
  readonly normal: Vector2;
  readonly distance: number;
}

type ResponseConstants = Pick<SimulationConstants, "restitution" | "margin">;

/**
 * Overlap against an edge, using its clamped closest point.
 *
 * When the center lies exactly on the edge, the edge perpendicular is used.
 * With the vertices counter-clockwise in angle this points into the polygon.
 */
function edgeContact(ball: Ball, edge: LineSegment, index: number): ContactCandidate | null {
  const { point } = Segment.closestPoint(edge, ball.position);
  const offset = Vec2.subtract(ball.position, point);
  const distance = Vec2.length(offset);
  if (distance >= ball.radius) return null;

  const normal =
    distance === 0
      ? Vec2.normalize(Vec2.perpendicular(Segment.vector(edge)))
      : Vec2.normalize(offset);

  return { feature: "edge", index, point, normal, distance };
}

function vertexContact(ball: Ball, vertex: Vector2, index: number): ContactCandidate | null {
  const offset = Vec2.subtract(ball.position, vertex);
  const distance = Vec2.length(offset);
  if (distance >= ball.radius) return null;

  const normal = distance === 0 ? VERTEX_FALLBACK_NORMAL : Vec2.normalize(offset);
  return { feature: "vertex", index, point: vertex, normal, distance };
}

/**
 * Respond to one contact in the rest frame of the moving wall.
 *
 * The ball velocity is taken relative to the wall velocity at the contact
 * point, reflected about the normal with restitution, and moved back to
 * the world frame. The ball is then pushed out of the wall by its
 * penetration plus the margin. Contacts that are already separating
 * (relative normal speed ≥ 0) are reported but left untouched.
 */
function applyContact(
  ball: Ball,
  polygon: Polygon,
  constants: ResponseConstants,
  candidate: ContactCandidate
): ContactReport {
  const wallVelocity = wallVelocityAt(polygon, candidate.point);
  const relative = Vec2.subtract(ball.velocity, wallVelocity);
  const approach = Vec2.dot(relative, candidate.normal);
  const penetration = ball.radius - candidate.distance;

  const report = {
    feature: candidate.feature,
    index: candidate.index,
    point: candidate.point,
    normal: candidate.normal,
    penetration,
    wallVelocity,
  };

  if (approach >= 0) {
    return { ...report, resolved: false };
  }

  const reflected = Vec2.subtract(
    relative,
    Vec2.scale(candidate.normal, (1 + constants.restitution) * approach)
  );
  ball.velocity = Vec2.add(reflected, wallVelocity);
  ball.position = Vec2.add(
    ball.position,
    Vec2.scale(candidate.normal, penetration + constants.margin)
  );

  return { ...report, resolved: true };
}

/**
 * Edge by edge, each edge followed by its two endpoints.
 *
 * Every check sees the ball as left by the checks before it, so a corner
 * contact can be resolved more than once in the same pass.
 */
function resolveIndependent(
  ball: Ball,
  polygon: Polygon,
  constants: ResponseConstants,
  vertices: readonly Vector2[]
): ContactReport[] {
  const reports: ContactReport[] = [];
  const edges = edgesFromVertices(vertices);
  const n = vertices.length;

  const check = (candidate: ContactCandidate | null): void => {
    if (candidate) {
      reports.push(applyContact(ball, polygon, constants, candidate));
    }
  };

  edges.forEach((edge, i) => {
    check(edgeContact(ball, edge, i));
    check(vertexContact(ball, edge.start, i));
    check(vertexContact(ball, edge.end, (i + 1) % n));
  });

  return reports;
}

/**
 * Single contact against the closest feature.
 *
 * The nearest clamped point over all edges decides. A point clamped to an
 * endpoint is a vertex contact; ties keep the lower edge index.
 */
function resolveNearestFeature(
  ball: Ball,
  polygon: Polygon,
  constants: ResponseConstants,
  vertices: readonly Vector2[]
): ContactReport[] {
  const edges = edgesFromVertices(vertices);
  const n = vertices.length;

  let nearestIndex = -1;
  let nearestT = 0;
  let nearestDistance = Number.POSITIVE_INFINITY;

  for (let i = 0; i < edges.length; i++) {
    const closest = Segment.closestPoint(edges[i], ball.position);
    const distance = Vec2.distance(ball.position, closest.point);
    if (distance < nearestDistance) {
      nearestIndex = i;
      nearestT = closest.t;
      nearestDistance = distance;
    }
  }

  if (nearestIndex < 0 || nearestDistance >= ball.radius) return [];

  const edge = edges[nearestIndex];
  let candidate: ContactCandidate | null;
  if (nearestT === 0) {
    candidate = vertexContact(ball, edge.start, nearestIndex);
  } else if (nearestT === 1) {
    candidate = vertexContact(ball, edge.end, (nearestIndex + 1) % n);
  } else {
    candidate = edgeContact(ball, edge, nearestIndex);
  }

  return candidate ? [applyContact(ball, polygon, constants, candidate)] : [];
}

/**
 * Detect and resolve every overlap between the ball and the polygon.
 *
 * Mutates the ball only. Never throws: degenerate directions fall back to
 * fixed normals.
 *
 * @returns One report per overlapping feature, in the order they were checked
 */
export function resolveCollisions(
  ball: Ball,
  polygon: Polygon,
  constants: ResponseConstants,
  mode: ContactMode = "independent"
): ContactReport[] {
  const vertices = verticesOf(polygon);
  return mode === "nearest-feature"
    ? resolveNearestFeature(ball, polygon, constants, vertices)
    : resolveIndependent(ball, polygon, constants, vertices);
}
