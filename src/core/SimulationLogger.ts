/**
 * SimulationLogger - Frame logging for debugging contact handling
 *
 * Enable this to capture the frames in which the ball touched the polygon.
 * Only frames with contacts are kept.
 */

import type { ContactReport, SimulationState, Vector2 } from "@/types";

/**
 * Debug log entry for a single frame with contacts.
 */
export interface SimulationDebugLog {
  frame: number;
  elapsed: number;
  timestamp: number;
  polygonAngle: number;
  ballPosition: Vector2;
  ballVelocity: Vector2;
  contacts: ContactReport[];
}

function formatVector(v: Vector2): string {
  return `(${v.x.toFixed(1)}, ${v.y.toFixed(1)})`;
}

/**
 * Global debug logger instance.
 */
class SimulationLoggerImpl {
  private enabled = false;
  private logs: SimulationDebugLog[] = [];
  private maxLogs = 100;
  private lastLog: SimulationDebugLog | null = null;

  enable(): void {
    this.enabled = true;
    console.log(
      "%c[SIMULATION DEBUG] Logging enabled. Use SimulationLogger.dump() to see logs.",
      "color: #00ff00; font-weight: bold"
    );
  }

  disable(): void {
    this.enabled = false;
    console.log("[SIMULATION DEBUG] Logging disabled.");
  }

  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Record the state after a step. Frames without contacts are skipped.
   */
  logFrame(state: Readonly<SimulationState>): void {
    if (!this.enabled || state.lastContacts.length === 0) return;

    const log: SimulationDebugLog = {
      frame: state.frame,
      elapsed: state.elapsed,
      timestamp: Date.now(),
      polygonAngle: state.polygon.angle,
      ballPosition: { ...state.ball.position },
      ballVelocity: { ...state.ball.velocity },
      contacts: [...state.lastContacts],
    };

    this.lastLog = log;
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    for (const contact of log.contacts) {
      if (!contact.resolved) continue;
      console.log(
        `[SIMULATION DEBUG] Frame ${log.frame}: ${contact.feature} ${contact.index} ` +
          `normal ${formatVector(contact.normal)} depth ${contact.penetration.toFixed(2)} ` +
          `-> velocity ${formatVector(log.ballVelocity)}`
      );
    }
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("%c[SIMULATION DEBUG] Dumping logs...", "color: #00ff00; font-weight: bold");
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`Frame ${log.frame} @ ${log.elapsed.toFixed(3)}s`);
      console.log("Polygon angle:", log.polygonAngle);
      console.log("Ball position:", log.ballPosition);
      console.log("Ball velocity:", log.ballVelocity);
      console.log("Contacts:", log.contacts);
      console.groupEnd();
    }
  }

  getLastLog(): SimulationDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly SimulationDebugLog[] {
    return this.logs;
  }

  clear(): void {
    this.logs = [];
    this.lastLog = null;
    console.log("[SIMULATION DEBUG] Logs cleared.");
  }
}

export const SimulationLogger = new SimulationLoggerImpl();
