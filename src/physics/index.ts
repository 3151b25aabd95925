export { resolveCollisions, VERTEX_FALLBACK_NORMAL } from "./CollisionResolver";
export { dampingFactor, integrate } from "./Integrator";
export {
  createPolygon,
  edgesFromVertices,
  edgesOf,
  rotate,
  verticesOf,
  wallVelocityAt,
} from "./Polygon";
export {
  HexagonSimulation,
  createBall,
  createSimulationState,
  getRenderState,
  kineticEnergy,
  step,
} from "./Simulation";
