import Phaser from "phaser";
import { DEFAULT_GAME_OPTIONS, createGameConfig } from "@/config/gameConfig";
import { DEFAULT_SIMULATION_CONFIG } from "@/config/simulationConfig";
import { SimulationLogger } from "@/core";
import { HexagonScene } from "@/scenes";

/**
 * Main entry point: one simulation in an 800x600 window
 */

declare global {
  interface Window {
    SimulationLogger: typeof SimulationLogger;
  }
}

// Reachable from the browser console
window.SimulationLogger = SimulationLogger;

if (!document.getElementById(DEFAULT_GAME_OPTIONS.parent)) {
  throw new Error(`Missing #${DEFAULT_GAME_OPTIONS.parent} element to host the game`);
}

const config = createGameConfig([new HexagonScene(DEFAULT_SIMULATION_CONFIG)]);
new Phaser.Game(config);
