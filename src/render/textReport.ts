import { PackageStatus, type PackageState } from "../domain/package.js";
import type { RobotState } from "../domain/robot.js";

const fmtCell = (cell: [number, number]) => `(${cell[0]}, ${cell[1]})`;

/**
 * 한 틱의 텍스트 요약 (콘솔 출력용). 좌표는 0-based.
 */
export function formatTickReport(params: {
  tick: number;
  totalReward: number;
  robots: readonly RobotState[];
  packages: readonly PackageState[];
}): string {
  const { tick, totalReward, robots, packages } = params;
  const lines = [
    `Time step: ${tick}`,
    `Total reward: ${totalReward.toFixed(2)}`,
    "Robots:",
    ...robots.map(
      (r, i) =>
        `  Robot ${i}: position ${fmtCell(r.position)}, carrying ${r.carrying ?? 0}`,
    ),
    "Undelivered packages:",
    ...packages
      .filter((p) => p.status !== PackageStatus.DELIVERED)
      .map(
        (p) =>
          `  Package ${p.id}: status=${p.status}, start=${fmtCell(p.start)}, target=${fmtCell(p.target)}`,
      ),
  ];
  return lines.join("\n");
}
