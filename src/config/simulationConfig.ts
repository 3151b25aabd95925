import type { SimulationConfig, SimulationConfigOverrides } from "@/types";

/**
 * Default simulation: a hexagon spinning at 45°/s with the ball dropped
 * 100px above its center, moving right.
 */
export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  gravity: 400, // pixels per second^2
  damping: 0.1, // fraction of velocity lost per second
  restitution: 0.9, // 1 = elastic
  margin: 0.1, // extra push-out after a bounce
  contactMode: "independent",
  clampDamping: false,
  polygon: {
    center: { x: 400, y: 300 },
    radius: 200,
    sides: 6,
    angle: 0,
    angularSpeed: Math.PI / 4,
  },
  ball: {
    position: { x: 400, y: 200 },
    velocity: { x: 100, y: 0 },
    radius: 10,
  },
};

/**
 * Merge overrides over the defaults. `polygon` and `ball` merge per field.
 */
export function createSimulationConfig(
  overrides: SimulationConfigOverrides = {},
  base: SimulationConfig = DEFAULT_SIMULATION_CONFIG
): SimulationConfig {
  const { polygon, ball, ...rest } = overrides;
  return {
    ...base,
    ...rest,
    polygon: { ...base.polygon, ...polygon },
    ball: { ...base.ball, ...ball },
  };
}

/**
 * List the problems that put a configuration outside what the physics
 * expects. Empty when the configuration is usable.
 *
 * The simulation itself never calls this; hosts decide what to do with it.
 */
export function validateSimulationConfig(config: SimulationConfig): string[] {
  const issues: string[] = [];

  const numbers: Array<[string, number]> = [
    ["gravity", config.gravity],
    ["damping", config.damping],
    ["restitution", config.restitution],
    ["margin", config.margin],
    ["polygon.center.x", config.polygon.center.x],
    ["polygon.center.y", config.polygon.center.y],
    ["polygon.radius", config.polygon.radius],
    ["polygon.sides", config.polygon.sides],
    ["polygon.angle", config.polygon.angle],
    ["polygon.angularSpeed", config.polygon.angularSpeed],
    ["ball.position.x", config.ball.position.x],
    ["ball.position.y", config.ball.position.y],
    ["ball.velocity.x", config.ball.velocity.x],
    ["ball.velocity.y", config.ball.velocity.y],
    ["ball.radius", config.ball.radius],
  ];
  for (const [name, value] of numbers) {
    if (!Number.isFinite(value)) {
      issues.push(`${name} must be a finite number (got ${value})`);
    }
  }

  if (config.gravity < 0) issues.push(`gravity must be >= 0 (got ${config.gravity})`);
  if (config.damping < 0) issues.push(`damping must be >= 0 (got ${config.damping})`);
  if (config.margin < 0) issues.push(`margin must be >= 0 (got ${config.margin})`);
  if (config.restitution < 0 || config.restitution > 1) {
    issues.push(`restitution must be within [0, 1] (got ${config.restitution})`);
  }
  if (config.polygon.radius <= 0) {
    issues.push(`polygon.radius must be > 0 (got ${config.polygon.radius})`);
  }
  if (!Number.isInteger(config.polygon.sides) || config.polygon.sides < 3) {
    issues.push(`polygon.sides must be an integer >= 3 (got ${config.polygon.sides})`);
  }
  if (config.ball.radius <= 0) {
    issues.push(`ball.radius must be > 0 (got ${config.ball.radius})`);
  }

  return issues;
}
