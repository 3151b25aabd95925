import { formatDebugInfo } from "@/core/formatDebugInfo";
import type { ContactReport, DebugInfo } from "@/types";
import { describe, expect, it } from "vitest";

const CONTACT: ContactReport = {
  feature: "edge",
  index: 2,
  point: { x: 0, y: 0 },
  normal: { x: 1, y: 0 },
  penetration: 0.456,
  wallVelocity: { x: 0, y: 0 },
  resolved: true,
};

function createInfo(overrides: Partial<DebugInfo> = {}): DebugInfo {
  return {
    fps: 60,
    renderer: "WebGL",
    frame: 42,
    ballPosition: { x: 412.345, y: 199.96 },
    ballVelocity: { x: -3.25, y: 120 },
    energy: 7205.6,
    polygonAngle: 1.23456,
    contacts: [],
    logging: false,
    ...overrides,
  };
}

describe("formatDebugInfo", () => {
  it("should list the simulation numbers", () => {
    expect(formatDebugInfo(createInfo())).toEqual([
      "fps: 60 (WebGL)",
      "frame: 42",
      "ball: (412.3, 200.0)",
      "velocity: (-3.3, 120.0)",
      "energy: 7206",
      "angle: 1.23 rad",
      "contacts: 0/0",
      "logging: off [L] dump [D]",
    ]);
  });

  it("should list resolved contacts below the count", () => {
    const lines = formatDebugInfo(
      createInfo({ contacts: [CONTACT, { ...CONTACT, feature: "vertex", index: 3, resolved: false }] })
    );

    expect(lines[6]).toBe("contacts: 1/2");
    expect(lines[7]).toBe("  edge 2 depth 0.46");
    expect(lines).toHaveLength(9);
  });

  it("should show when logging is on", () => {
    const lines = formatDebugInfo(createInfo({ logging: true, renderer: "Canvas" }));

    expect(lines[0]).toBe("fps: 60 (Canvas)");
    expect(lines[lines.length - 1]).toBe("logging: on [L] dump [D]");
  });
});
