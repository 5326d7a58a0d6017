import { describe, it, expect } from "vitest";
import { createGrid } from "../grid/grid.js";
import { PackageStatus } from "../domain/package.js";
import { renderEpisodeSvg } from "../render/renderEpisodeSvg.js";
import { formatTickReport } from "../render/textReport.js";
import { getCellCenterPx, tickToPct } from "../render/layout.js";
import type { EpisodeRecording } from "../render/types.js";

// 1x2 grid: robot picks up at (0,0) on tick 0 and carries it one cell right
const recording: EpisodeRecording = {
  grid: createGrid([[0, 0]]),
  frames: [
    { tick: 0, positions: [[0, 0]], carrying: [null], totalReward: 0 },
    { tick: 1, positions: [[0, 1]], carrying: [1], totalReward: -0.01 },
  ],
  packages: [
    {
      id: 1,
      start: [0, 0],
      target: [0, 1],
      spawnTime: 0,
      deadline: 5,
      pickupTick: 0,
      deliveryTick: null,
    },
  ],
};

describe("layout", () => {
  it("centres markers in their cells", () => {
    expect(getCellCenterPx(12, 12, 0, 1)).toEqual({ x: 29, y: 17 });
  });

  it("clamps tick percentages", () => {
    expect(tickToPct(1, 1, 2)).toBe(50);
    expect(tickToPct(5, 1, 2)).toBe(100);
    expect(tickToPct(1, 1, 0)).toBe(0);
  });
});

describe("renderEpisodeSvg", () => {
  const svg = renderEpisodeSvg(recording, {
    tickTimeS: 1,
    loop: false,
    scale: 1,
  });

  it("sizes the canvas from the grid", () => {
    expect(svg).toContain('width="46" height="48" viewBox="0 0 46 48"');
    expect(svg).toContain(
      '<rect x="12" y="12" width="10" height="10" fill="#161b22" rx="2"/>',
    );
  });

  it("animates robots between cell centres", () => {
    expect(svg).toContain(
      "50.0000% { transform: translate(29px, 17px); }",
    );
    expect(svg).toContain(
      'style="animation: robot-0 2s linear 0s 1 both"',
    );
  });

  it("hides a package marker after it is picked up", () => {
    expect(svg).toContain(`
  @keyframes pkg-start-1 {
    0% { opacity: 1; }
    50.0000% { opacity: 0; }
    100% { opacity: 0; }
  }`);
    expect(svg).toContain(`
  @keyframes pkg-target-1 {
    0% { opacity: 1; }
    100% { opacity: 1; }
  }`);
  });

  it("shows cargo while carrying", () => {
    expect(svg).toContain(`
  @keyframes robot-cargo-0 {
    0.0000% { opacity: 0; }
    50.0000% { opacity: 1; }
  }`);
  });

  it("prints a summary line", () => {
    expect(svg).toContain("ticks 1 · delivered 0/1 · reward -0.01");
  });

  it("loops by default and scales the display size", () => {
    const looped = renderEpisodeSvg(recording);
    expect(looped).toContain('width="92" height="96" viewBox="0 0 46 48"');
    expect(looped).toContain("infinite both");
  });
});

describe("formatTickReport", () => {
  it("lists robots and undelivered packages", () => {
    const report = formatTickReport({
      tick: 7,
      totalReward: 9.954,
      robots: [
        { position: [0, 1], carrying: 2 },
        { position: [3, 3], carrying: null },
      ],
      packages: [
        {
          id: 1,
          start: [0, 0],
          target: [0, 2],
          spawnTime: 0,
          deadline: 9,
          status: PackageStatus.DELIVERED,
        },
        {
          id: 2,
          start: [1, 1],
          target: [2, 2],
          spawnTime: 3,
          deadline: 20,
          status: PackageStatus.IN_TRANSIT,
        },
      ],
    });
    expect(report.split("\n")).toEqual([
      "Time step: 7",
      "Total reward: 9.95",
      "Robots:",
      "  Robot 0: position (0, 1), carrying 2",
      "  Robot 1: position (3, 3), carrying 0",
      "Undelivered packages:",
      `  Package 2: status=${PackageStatus.IN_TRANSIT}, start=(1, 1), target=(2, 2)`,
    ]);
  });
});
