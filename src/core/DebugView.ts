import Phaser from "phaser";
import type { DebugInfo } from "@/types";
import { formatDebugInfo } from "./formatDebugInfo";

/**
 * Overlay with live simulation numbers, toggled with the backquote key
 */
export class DebugView {
  private scene: Phaser.Scene;
  private textObject: Phaser.GameObjects.Text | null = null;
  private visible = false;

  constructor(scene: Phaser.Scene) {
    this.scene = scene;
  }

  create(): void {
    this.textObject = this.scene.add.text(10, 40, "", {
      fontFamily: "JetBrains Mono, monospace",
      fontSize: "12px",
      color: "#00ff88",
      backgroundColor: "rgba(0, 0, 0, 0.7)",
      padding: { x: 8, y: 6 },
    });
    this.textObject.setDepth(9999);
    this.textObject.setVisible(this.visible);
  }

  toggle(): void {
    this.visible = !this.visible;
    this.textObject?.setVisible(this.visible);
  }

  /**
   * Redraw the overlay. `getInfo` only runs while the overlay is shown.
   */
  update(getInfo: (renderer: DebugInfo["renderer"], fps: number) => DebugInfo): void {
    if (!this.visible || !this.textObject) return;

    const { game } = this.scene;
    const renderer = game.renderer.type === Phaser.WEBGL ? "WebGL" : "Canvas";
    const info = getInfo(renderer, Math.round(game.loop.actualFps));
    this.textObject.setText(formatDebugInfo(info).join("\n"));
  }

  destroy(): void {
    this.textObject?.destroy();
    this.textObject = null;
  }
}
