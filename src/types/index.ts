/**
 * Core type definitions for the spinning hexagon simulation
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 2D Vector representation (immutable) */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

/** Line segment defined by two endpoints */
export interface LineSegment {
  readonly start: Vector2;
  readonly end: Vector2;
}

// =============================================================================
// SIMULATION TYPES
// =============================================================================

/** The ball. Mutated in place by the integrator and the collision resolver. */
export interface Ball {
  position: Vector2;
  velocity: Vector2;
  readonly radius: number;
}

/** Regular polygon rotating about its center. Only `angle` changes over time. */
export interface Polygon {
  readonly center: Vector2;
  readonly radius: number;
  readonly sides: number;
  angle: number;
  readonly angularSpeed: number;
}

/** Physical constants, fixed for the lifetime of a simulation */
export interface SimulationConstants {
  readonly gravity: number;
  readonly damping: number;
  readonly restitution: number;
  readonly margin: number;
}

/**
 * How the resolver treats edges and their endpoints.
 * - independent: every edge, then each of its endpoints, resolved in turn
 * - nearest-feature: a single contact against the closest feature
 */
export type ContactMode = "independent" | "nearest-feature";

/** Behavioural switches of the simulation */
export interface SimulationOptions {
  readonly contactMode: ContactMode;
  /** Clamp the per-step damping factor to [0, 1] */
  readonly clampDamping: boolean;
}

/** Feature of the polygon a contact was found against */
export type ContactFeature = "edge" | "vertex";

/** One overlap between the ball and a polygon feature during a step */
export interface ContactReport {
  readonly feature: ContactFeature;
  /** Edge index, or vertex index for vertex contacts */
  readonly index: number;
  readonly point: Vector2;
  readonly normal: Vector2;
  readonly penetration: number;
  readonly wallVelocity: Vector2;
  /** False when the ball was already separating from the wall */
  readonly resolved: boolean;
}

/** Explicitly owned simulation state */
export interface SimulationState {
  readonly ball: Ball;
  readonly polygon: Polygon;
  readonly constants: SimulationConstants;
  readonly options: SimulationOptions;
  lastContacts: ContactReport[];
  elapsed: number;
  frame: number;
}

/** Read-only snapshot handed to the renderer */
export interface RenderState {
  readonly polygonVertices: readonly Vector2[];
  readonly ballPosition: Vector2;
  readonly ballRadius: number;
}

// =============================================================================
// CONFIGURATION TYPES
// =============================================================================

export interface PolygonConfig {
  readonly center: Vector2;
  readonly radius: number;
  readonly sides: number;
  readonly angle: number;
  readonly angularSpeed: number;
}

export interface BallConfig {
  readonly position: Vector2;
  readonly velocity: Vector2;
  readonly radius: number;
}

/** Everything needed to build a simulation */
export interface SimulationConfig extends SimulationConstants, SimulationOptions {
  readonly polygon: PolygonConfig;
  readonly ball: BallConfig;
}

/** Partial overrides accepted by createSimulationConfig */
export interface SimulationConfigOverrides extends Partial<SimulationConstants>, Partial<SimulationOptions> {
  readonly polygon?: Partial<PolygonConfig>;
  readonly ball?: Partial<BallConfig>;
}

// =============================================================================
// SHELL TYPES
// =============================================================================

/** Game configuration options */
export interface GameOptions {
  readonly width: number;
  readonly height: number;
  readonly backgroundColor: number;
  readonly title: string;
  readonly parent: string;
}

/** Snapshot shown by the debug overlay */
export interface DebugInfo {
  readonly fps: number;
  readonly renderer: "WebGL" | "Canvas";
  readonly frame: number;
  readonly ballPosition: Vector2;
  readonly ballVelocity: Vector2;
  readonly energy: number;
  readonly polygonAngle: number;
  readonly contacts: readonly ContactReport[];
  readonly logging: boolean;
}
