import { DEFAULT_SIMULATION_CONFIG } from "@/config/simulationConfig";
import { Vec2 } from "@/math/Vec2";
import type {
  Ball,
  BallConfig,
  ContactReport,
  Polygon,
  RenderState,
  SimulationConfig,
  SimulationState,
} from "@/types";
import { resolveCollisions } from "./CollisionResolver";
import { integrate } from "./Integrator";
import { createPolygon, rotate, verticesOf } from "./Polygon";

export function createBall(config: BallConfig): Ball {
  return {
    position: { ...config.position },
    velocity: { ...config.velocity },
    radius: config.radius,
  };
}

/**
 * Build a fresh, independently owned simulation state
 */
export function createSimulationState(
  config: SimulationConfig = DEFAULT_SIMULATION_CONFIG
): SimulationState {
  return {
    ball: createBall(config.ball),
    polygon: createPolygon(config.polygon),
    constants: {
      gravity: config.gravity,
      damping: config.damping,
      restitution: config.restitution,
      margin: config.margin,
    },
    options: {
      contactMode: config.contactMode,
      clampDamping: config.clampDamping,
    },
    lastContacts: [],
    elapsed: 0,
    frame: 0,
  };
}

/**
 * Advance the simulation by `dt` seconds.
 *
 * Order: rotate the polygon, integrate the ball, then resolve contacts
 * against the vertices at the new angle. `dt` is not validated.
 */
export function step(state: SimulationState, dt: number): void {
  rotate(state.polygon, dt);
  integrate(state.ball, state.constants, dt, state.options.clampDamping);
  state.lastContacts = resolveCollisions(
    state.ball,
    state.polygon,
    state.constants,
    state.options.contactMode
  );
  state.elapsed += dt;
  state.frame += 1;
}

/**
 * Snapshot for drawing. Holds copies only.
 */
export function getRenderState(state: SimulationState): RenderState {
  return {
    polygonVertices: verticesOf(state.polygon),
    ballPosition: { ...state.ball.position },
    ballRadius: state.ball.radius,
  };
}

/** Kinetic energy of the ball per unit mass */
export function kineticEnergy(ball: Ball): number {
  return 0.5 * Vec2.lengthSquared(ball.velocity);
}

/**
 * HexagonSimulation - owns one simulation state
 *
 * Hosts call `step(dt)` once per frame and read `getRenderState()` to draw.
 */
export class HexagonSimulation {
  private readonly state: SimulationState;

  constructor(config: SimulationConfig = DEFAULT_SIMULATION_CONFIG) {
    this.state = createSimulationState(config);
  }

  get ball(): Readonly<Ball> {
    return createBall(this.state.ball);
  }

  get polygon(): Readonly<Polygon> {
    return createPolygon(this.state.polygon);
  }

  get lastContacts(): readonly ContactReport[] {
    return this.state.lastContacts;
  }

  get elapsed(): number {
    return this.state.elapsed;
  }

  get frame(): number {
    return this.state.frame;
  }

  step(dt: number): void {
    step(this.state, dt);
  }

  getRenderState(): RenderState {
    return getRenderState(this.state);
  }

  /**
   * Copy of the full state, for logging and inspection
   */
  snapshot(): SimulationState {
    const { ball, polygon, constants, options, lastContacts, elapsed, frame } = this.state;
    return {
      ball: createBall(ball),
      polygon: createPolygon(polygon),
      constants,
      options,
      lastContacts: [...lastContacts],
      elapsed,
      frame,
    };
  }
}
