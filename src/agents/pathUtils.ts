import { cellKey, isFree, sameCell, type Cell, type Grid } from "../grid/grid.js";
import { DIRECTIONAL_MOVES, MOVE_DELTAS, Move } from "../domain/actions.js";

/**
 * 한 칸에서 BFS, 빈 칸만 확장. 상하좌우 4방향.
 * key(row,col) → 거리. 닿지 않는 칸은 맵에 없다.
 */
export function bfsDistances(grid: Grid, from: Cell): Map<string, number> {
  const dist = new Map<string, number>();
  if (!isFree(grid, from)) return dist;

  const queue: Cell[] = [from];
  dist.set(cellKey(from), 0);
  for (let head = 0; head < queue.length; head++) {
    const cur = queue[head];
    const d = dist.get(cellKey(cur)) ?? 0;
    for (const move of DIRECTIONAL_MOVES) {
      const [dr, dc] = MOVE_DELTAS[move];
      const next: Cell = [cur[0] + dr, cur[1] + dc];
      const nk = cellKey(next);
      if (!isFree(grid, next) || dist.has(nk)) continue;
      dist.set(nk, d + 1);
      queue.push(next);
    }
  }
  return dist;
}

function descend(toGoal: Map<string, number>, from: Cell): Move {
  const here = toGoal.get(cellKey(from));
  if (here == null || here === 0) return Move.STAY;
  for (const move of DIRECTIONAL_MOVES) {
    const [dr, dc] = MOVE_DELTAS[move];
    const d = toGoal.get(cellKey([from[0] + dr, from[1] + dc]));
    if (d != null && d < here) return move;
  }
  return Move.STAY;
}

/**
 * goal 쪽으로 한 칸 다가가는 이동. 이미 도착했거나 닿을 수 없으면 STAY.
 * 후보가 여럿이면 L, R, U, D 순서로 첫 번째.
 */
export function stepToward(grid: Grid, from: Cell, goal: Cell): Move {
  if (sameCell(from, goal)) return Move.STAY;
  return descend(bfsDistances(grid, goal), from);
}
