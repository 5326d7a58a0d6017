import { cellKey, createGrid, sameCell, type Cell, type Grid } from "../grid/grid.js";
import { Move, PackageAction, type RobotAction } from "../domain/actions.js";
import { proposeTarget } from "../sim/movement.js";
import type { Snapshot } from "../sim/snapshot.js";
import type { AgentPolicy } from "./types.js";
import { bfsDistances, stepToward } from "./pathUtils.js";

type KnownPackage = {
  id: number;
  start: Cell;
  target: Cell;
};

/**
 * 탐욕 정책.
 * - 스냅샷은 새로 공개된 패키지만 주므로 직접 기억한다.
 * - 빈손 로봇은 아직 아무도 맡지 않은 대기 패키지 중 BFS 거리가 가장 가까운 것을 맡는다 (동률이면 id 작은 것).
 * - 시작 칸/목표 칸에 들어서는 틱에 바로 PICKUP/DROP을 같이 보낸다.
 * 다른 로봇과의 충돌은 환경의 이동 해석에 맡긴다.
 */
export class GreedyAgent implements AgentPolicy {
  readonly name = "greedy";

  private grid: Grid | null = null;
  private known = new Map<number, KnownPackage>();
  private waiting = new Set<number>();
  private assignment: (number | null)[] = [];

  init(snapshot: Snapshot): void {
    this.grid = createGrid(snapshot.map);
    this.known.clear();
    this.waiting.clear();
    this.assignment = snapshot.robots.map(() => null);
    this.remember(snapshot);
  }

  getActions(snapshot: Snapshot): RobotAction[] {
    const grid = this.grid;
    if (!grid) {
      throw new Error("GreedyAgent.getActions() called before init()");
    }
    this.remember(snapshot);

    // 누군가 들고 있는 패키지는 대기 목록에서 제외
    for (const [, , carrying] of snapshot.robots) {
      if (carrying !== 0) this.waiting.delete(carrying);
    }

    return snapshot.robots.map(([row, col, carrying], i) => {
      const pos: Cell = [row - 1, col - 1];
      if (carrying !== 0) {
        this.assignment[i] = null;
        const pkg = this.known.get(carrying);
        if (!pkg) return [Move.STAY, PackageAction.NONE];
        return this.approach(grid, pos, pkg.target, PackageAction.DROP);
      }

      const assigned = this.assignment[i];
      if (assigned == null || !this.waiting.has(assigned)) {
        this.assignment[i] = this.pickNearest(grid, pos, i);
      }
      const target = this.assignment[i];
      const pkg = target == null ? undefined : this.known.get(target);
      if (!pkg) return [Move.STAY, PackageAction.NONE];
      return this.approach(grid, pos, pkg.start, PackageAction.PICKUP);
    });
  }

  private remember(snapshot: Snapshot): void {
    for (const [id, sr, sc, tr, tc] of snapshot.packages) {
      this.known.set(id, {
        id,
        start: [sr - 1, sc - 1],
        target: [tr - 1, tc - 1],
      });
      this.waiting.add(id);
    }
  }

  private approach(
    grid: Grid,
    pos: Cell,
    goal: Cell,
    onArrival: PackageAction,
  ): RobotAction {
    if (sameCell(pos, goal)) return [Move.STAY, onArrival];
    const move = stepToward(grid, pos, goal);
    const next = proposeTarget(grid, pos, move);
    return [move, sameCell(next, goal) ? onArrival : PackageAction.NONE];
  }

  private pickNearest(grid: Grid, pos: Cell, robot: number): number | null {
    const taken = new Set<number>();
    this.assignment.forEach((id, j) => {
      if (j !== robot && id != null) taken.add(id);
    });
    const dist = bfsDistances(grid, pos);
    let best: { id: number; d: number } | null = null;
    for (const id of this.waiting) {
      if (taken.has(id)) continue;
      const pkg = this.known.get(id);
      if (!pkg) continue;
      const d = dist.get(cellKey(pkg.start));
      if (d == null) continue;
      if (!best || d < best.d || (d === best.d && id < best.id)) {
        best = { id, d };
      }
    }
    return best ? best.id : null;
  }
}
