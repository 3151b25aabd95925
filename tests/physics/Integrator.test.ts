import { dampingFactor, integrate } from "@/physics/Integrator";
import { createTestBall } from "@test/helpers/simulationHelpers";
import { describe, expect, it } from "vitest";

describe("Integrator", () => {
  describe("integrate", () => {
    it("should apply gravity to the velocity before moving the ball", () => {
      const ball = createTestBall({ x: 0, y: 0 }, { x: 0, y: 0 });
      integrate(ball, { gravity: 10, damping: 0 }, 0.5);

      expect(ball.velocity).toEqual({ x: 0, y: 5 });
      // Semi-implicit: position uses the updated velocity
      expect(ball.position).toEqual({ x: 0, y: 2.5 });
    });

    it("should only accelerate along +y", () => {
      const ball = createTestBall({ x: 1, y: 1 }, { x: 4, y: 0 });
      integrate(ball, { gravity: 8, damping: 0 }, 0.25);

      expect(ball.velocity).toEqual({ x: 4, y: 2 });
      expect(ball.position).toEqual({ x: 2, y: 1.5 });
    });

    it("should damp the velocity after moving the ball", () => {
      const ball = createTestBall({ x: 0, y: 0 }, { x: 10, y: -20 });
      integrate(ball, { gravity: 0, damping: 0.5 }, 0.5);

      expect(ball.position).toEqual({ x: 5, y: -10 });
      expect(ball.velocity).toEqual({ x: 7.5, y: -15 });
    });

    it("should leave a resting ball alone without forces", () => {
      const ball = createTestBall({ x: 3, y: 4 }, { x: 0, y: 0 });
      integrate(ball, { gravity: 0, damping: 0 }, 1 / 60);

      expect(ball.position).toEqual({ x: 3, y: 4 });
      expect(ball.velocity).toEqual({ x: 0, y: 0 });
    });

    it("should invert the velocity when damping * dt exceeds one", () => {
      const ball = createTestBall({ x: 0, y: 0 }, { x: 10, y: 0 });
      integrate(ball, { gravity: 0, damping: 2 }, 1);

      expect(ball.velocity.x).toBe(-10);
    });

    it("should stop the ball instead when damping is clamped", () => {
      const ball = createTestBall({ x: 0, y: 0 }, { x: 10, y: 0 });
      integrate(ball, { gravity: 0, damping: 2 }, 1, true);

      expect(ball.position).toEqual({ x: 10, y: 0 });
      expect(ball.velocity.x).toBe(0);
    });
  });

  describe("dampingFactor", () => {
    it("should be 1 - d·dt", () => {
      expect(dampingFactor(0.5, 0.5)).toBe(0.75);
    });

    it("should clamp to [0, 1] on request", () => {
      expect(dampingFactor(3, 1, true)).toBe(0);
      expect(dampingFactor(-1, 1, true)).toBe(1);
      expect(dampingFactor(3, 1)).toBe(-2);
    });
  });
});
