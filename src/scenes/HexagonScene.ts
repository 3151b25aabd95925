import { DebugView, InputManager, SimulationLogger } from "@/core";
import { DEFAULT_SIMULATION_CONFIG, validateSimulationConfig } from "@/config/simulationConfig";
import { HexagonSimulation, kineticEnergy } from "@/physics";
import { SimulationRenderer } from "@/render/SimulationRenderer";
import type { SimulationConfig } from "@/types";
import Phaser from "phaser";

/**
 * Window around the simulation: steps it once per frame and draws the result.
 */
export class HexagonScene extends Phaser.Scene {
  private readonly simulationConfig: SimulationConfig;
  private simulation!: HexagonSimulation;
  private simulationRenderer!: SimulationRenderer;
  private inputManager!: InputManager;
  private debugView!: DebugView;

  constructor(config: SimulationConfig = DEFAULT_SIMULATION_CONFIG) {
    super({ key: "HexagonScene" });
    this.simulationConfig = config;
  }

  create(): void {
    for (const issue of validateSimulationConfig(this.simulationConfig)) {
      console.warn(`[HexagonScene] Invalid configuration: ${issue}`);
    }

    this.simulation = new HexagonSimulation(this.simulationConfig);
    this.simulationRenderer = new SimulationRenderer(this.add.graphics());

    this.inputManager = new InputManager(this);
    this.debugView = new DebugView(this);
    this.debugView.create();

    this.inputManager.onKeyPress("Escape", () => {
      this.game.destroy(true);
    });
    this.inputManager.onKeyPress("Backquote", () => {
      this.debugView.toggle();
    });
    this.inputManager.onKeyPress("KeyL", () => {
      SimulationLogger.toggle();
    });
    this.inputManager.onKeyPress("KeyD", () => {
      SimulationLogger.dump();
    });

    this.add.text(10, 10, "Ball bouncing inside a spinning hexagon", {
      fontFamily: "JetBrains Mono, monospace",
      fontSize: "14px",
      color: "#ffffff",
    });

    this.events.once(Phaser.Scenes.Events.SHUTDOWN, () => {
      this.inputManager.destroy();
      this.debugView.destroy();
      this.simulationRenderer.dispose();
    });
  }

  update(_time: number, delta: number): void {
    // Convert delta from ms to seconds
    this.simulation.step(delta / 1000);
    this.simulationRenderer.render(this.simulation.getRenderState());

    if (SimulationLogger.isEnabled()) {
      SimulationLogger.logFrame(this.simulation.snapshot());
    }

    this.debugView.update((renderer, fps) => {
      const ball = this.simulation.ball;
      return {
        fps,
        renderer,
        frame: this.simulation.frame,
        ballPosition: ball.position,
        ballVelocity: ball.velocity,
        energy: kineticEnergy(ball),
        polygonAngle: this.simulation.polygon.angle,
        contacts: this.simulation.lastContacts,
        logging: SimulationLogger.isEnabled(),
      };
    });
  }
}
