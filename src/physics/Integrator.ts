import { Vec2 } from "@/math/Vec2";
import type { Ball, SimulationConstants } from "@/types";

/**
 * Per-step velocity multiplier for linear damping.
 *
 * `1 - d·dt` goes negative once `d·dt > 1`, which flips the velocity.
 * With `clamp` set the factor is kept in [0, 1] instead.
 */
export function dampingFactor(damping: number, dt: number, clamp = false): number {
  const factor = 1 - damping * dt;
  return clamp ? Vec2.clamp(factor, 0, 1) : factor;
}

/**
 * Advance the ball by one step.
 *
 * Semi-implicit Euler: gravity updates the velocity first, the new velocity
 * moves the ball, then damping is applied. Gravity points towards +y.
 */
export function integrate(
  ball: Ball,
  constants: Pick<SimulationConstants, "gravity" | "damping">,
  dt: number,
  clampDamping = false
): void {
  const vy = ball.velocity.y + constants.gravity * dt;
  const vx = ball.velocity.x;

  ball.position = {
    x: ball.position.x + vx * dt,
    y: ball.position.y + vy * dt,
  };

  const factor = dampingFactor(constants.damping, dt, clampDamping);
  ball.velocity = { x: vx * factor, y: vy * factor };
}
