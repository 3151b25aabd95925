/**
 * SimulationRenderer - draws a RenderState
 *
 * Polygon outline in white, ball as a filled red circle.
 */

import type { RenderState } from "@/types";

/**
 * Graphics interface for rendering (Phaser-compatible).
 */
export interface IGraphics {
  clear(): void;
  lineStyle(width: number, color: number, alpha?: number): void;
  fillStyle(color: number, alpha?: number): void;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  closePath(): void;
  strokePath(): void;
  fillCircle(x: number, y: number, radius: number): void;
}

export interface RenderConfig {
  readonly polygonColor: number;
  readonly polygonLineWidth: number;
  readonly ballColor: number;
}

export const DEFAULT_RENDER_CONFIG: RenderConfig = {
  polygonColor: 0xffffff,
  polygonLineWidth: 1,
  ballColor: 0xff0000,
};

export class SimulationRenderer {
  private graphics: IGraphics;
  private config: RenderConfig;

  constructor(graphics: IGraphics, config: Partial<RenderConfig> = {}) {
    this.graphics = graphics;
    this.config = { ...DEFAULT_RENDER_CONFIG, ...config };
  }

  render(state: RenderState): void {
    this.graphics.clear();
    this.drawPolygon(state.polygonVertices);

    this.graphics.fillStyle(this.config.ballColor, 1);
    this.graphics.fillCircle(state.ballPosition.x, state.ballPosition.y, state.ballRadius);
  }

  private drawPolygon(vertices: RenderState["polygonVertices"]): void {
    const [first, ...rest] = vertices;
    if (!first) return;

    this.graphics.lineStyle(this.config.polygonLineWidth, this.config.polygonColor, 1);
    this.graphics.beginPath();
    this.graphics.moveTo(first.x, first.y);
    for (const vertex of rest) {
      this.graphics.lineTo(vertex.x, vertex.y);
    }
    this.graphics.closePath();
    this.graphics.strokePath();
  }

  dispose(): void {
    this.graphics.clear();
  }
}
