import type { DebugInfo, Vector2 } from "@/types";

function formatVector(v: Vector2): string {
  return `(${v.x.toFixed(1)}, ${v.y.toFixed(1)})`;
}

/**
 * Lines shown by the debug overlay, top to bottom.
 */
export function formatDebugInfo(info: DebugInfo): string[] {
  const resolved = info.contacts.filter((c) => c.resolved);
  const lines = [
    `fps: ${info.fps} (${info.renderer})`,
    `frame: ${info.frame}`,
    `ball: ${formatVector(info.ballPosition)}`,
    `velocity: ${formatVector(info.ballVelocity)}`,
    `energy: ${Math.round(info.energy)}`,
    `angle: ${info.polygonAngle.toFixed(2)} rad`,
    `contacts: ${resolved.length}/${info.contacts.length}`,
  ];

  for (const contact of resolved) {
    lines.push(`  ${contact.feature} ${contact.index} depth ${contact.penetration.toFixed(2)}`);
  }

  lines.push(`logging: ${info.logging ? "on" : "off"} [L] dump [D]`);
  return lines;
}
