import type { GameOptions } from "@/types";
import Phaser from "phaser";

/**
 * Default game options
 */
export const DEFAULT_GAME_OPTIONS: GameOptions = {
  width: 800,
  height: 600,
  backgroundColor: 0x000000,
  title: "Bouncing Ball in a Rotating Hexagon",
  parent: "game-container",
};

/**
 * Creates the Phaser game configuration
 * The simulation does its own physics, so no Phaser physics plugin is enabled
 */
export function createGameConfig(
  scenes: Phaser.Types.Scenes.SceneType[],
  options: Partial<GameOptions> = {}
): Phaser.Types.Core.GameConfig {
  const opts = { ...DEFAULT_GAME_OPTIONS, ...options };

  return {
    type: Phaser.AUTO,
    title: opts.title,
    width: opts.width,
    height: opts.height,
    backgroundColor: opts.backgroundColor,
    parent: opts.parent,
    scene: scenes,
    scale: {
      mode: Phaser.Scale.FIT,
      autoCenter: Phaser.Scale.CENTER_BOTH,
    },
    render: {
      antialias: true,
      pixelArt: false,
      roundPixels: false,
    },
  };
}
