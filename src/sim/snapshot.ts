import { toMatrix, type Grid } from "../grid/grid.js";
import type { RobotState } from "../domain/robot.js";
import type { PackageState } from "../domain/package.js";

/** (row, col, carryingId) — 1-based, 빈손이면 0 */
export type RobotView = [row: number, col: number, carrying: number];

/** (id, startRow, startCol, targetRow, targetCol, spawnTime, deadline) — 1-based */
export type PackageView = [
  id: number,
  startRow: number,
  startCol: number,
  targetRow: number,
  targetCol: number,
  spawnTime: number,
  deadline: number,
];

/**
 * 에이전트·렌더러에 공개되는 한 틱의 상태.
 * packages에는 이번 틱에 새로 공개된 패키지만 들어간다 (누적 아님).
 */
export type Snapshot = {
  timeStep: number;
  map: number[][];
  robots: RobotView[];
  packages: PackageView[];
};

export function toRobotView(robot: RobotState): RobotView {
  return [robot.position[0] + 1, robot.position[1] + 1, robot.carrying ?? 0];
}

export function toPackageView(pkg: PackageState): PackageView {
  return [
    pkg.id,
    pkg.start[0] + 1,
    pkg.start[1] + 1,
    pkg.target[0] + 1,
    pkg.target[1] + 1,
    pkg.spawnTime,
    pkg.deadline,
  ];
}

export function buildSnapshot(
  tick: number,
  grid: Grid,
  robots: readonly RobotState[],
  revealed: readonly PackageState[],
): Snapshot {
  return {
    timeStep: tick,
    map: toMatrix(grid),
    robots: robots.map(toRobotView),
    packages: revealed.map(toPackageView),
  };
}
