import type Phaser from "phaser";

/**
 * Manages keyboard input for the simulation window
 * Keys are identified by `KeyboardEvent.code`
 */
export class InputManager {
  private scene: Phaser.Scene;
  private keys: Set<string> = new Set();
  private keyCallbacks: Map<string, () => void> = new Map();

  constructor(scene: Phaser.Scene) {
    this.scene = scene;
    this.setupInputListeners();
  }

  private setupInputListeners(): void {
    this.scene.input.keyboard?.on("keydown", this.handleKeyDown, this);
    this.scene.input.keyboard?.on("keyup", this.handleKeyUp, this);
  }

  private handleKeyDown(event: KeyboardEvent): void {
    // Held keys repeat keydown; fire callbacks only on the first one
    if (this.keys.has(event.code)) return;
    this.keys.add(event.code);
    const callback = this.keyCallbacks.get(event.code);
    if (callback) callback();
  }

  private handleKeyUp(event: KeyboardEvent): void {
    this.keys.delete(event.code);
  }

  /** Register a callback for a specific key press */
  onKeyPress(keyCode: string, callback: () => void): void {
    this.keyCallbacks.set(keyCode, callback);
  }

  /** Clean up input listeners */
  destroy(): void {
    this.scene.input.keyboard?.off("keydown", this.handleKeyDown, this);
    this.scene.input.keyboard?.off("keyup", this.handleKeyUp, this);
    this.keyCallbacks.clear();
    this.keys.clear();
  }
}
