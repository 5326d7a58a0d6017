import { cellKey, isFree, sameCell, type Cell, type Grid } from "../grid/grid.js";
import { MOVE_DELTAS, type Move } from "../domain/actions.js";

export type MovementResult = {
  /** 로봇별 최종 위치 (서로 모두 다름) */
  finalPositions: Cell[];
  /** 실제로 칸이 바뀐 로봇 */
  moved: boolean[];
  /** 순환(스왑 포함)에 걸렸거나 순환을 기다리다 끝까지 결정되지 못해 제자리에 남은 로봇 */
  deadlocked: number[];
};

/** 이동 명령 → 목표 칸. 맵 밖·장애물이면 제자리 (Stay와 동일). */
export function proposeTarget(grid: Grid, position: Cell, move: Move): Cell {
  const [dr, dc] = MOVE_DELTAS[move];
  const raw: Cell = [position[0] + dr, position[1] + dc];
  return isFree(grid, raw) ? raw : [position[0], position[1]];
}

/**
 * 동시에 들어온 이동 요청을 충돌 없는 최종 위치로 정리한다.
 *
 * 대기 그래프: i의 목표 칸에 다른 로봇 j가 지금 서 있으면 i → j.
 * 나가는 간선이 없거나 후속 로봇이 이미 결정된 로봇부터, 항상 가장 낮은 인덱스를 먼저 결정한다.
 * - 목표 칸이 아직 점유(claim)되지 않았으면 이동하고 그 칸을 점유
 * - 이미 점유됐으면 제자리에 남고 현재 칸을 점유
 * 끝까지 결정되지 않은 로봇은 순환 위(또는 순환 뒤)에 있으므로 모두 제자리.
 * 두 로봇의 맞교환은 항상 거부된다.
 */
export function resolveMovement(
  grid: Grid,
  positions: readonly Cell[],
  moves: readonly Move[],
): MovementResult {
  const n = positions.length;
  const targets = positions.map((p, i) => proposeTarget(grid, p, moves[i]));

  const occupant = new Map<string, number>();
  positions.forEach((p, i) => occupant.set(cellKey(p), i));

  // waitsOn[i] = 목표 칸의 현재 주인 (없거나 자기 자신이면 -1)
  const waitsOn = targets.map((t, i) => {
    const j = occupant.get(cellKey(t));
    return j != null && j !== i ? j : -1;
  });
  const waiters: number[][] = Array.from({ length: n }, () => []);
  waitsOn.forEach((j, i) => {
    if (j >= 0) waiters[j].push(i);
  });

  const ready: number[] = [];
  for (let i = 0; i < n; i++) if (waitsOn[i] < 0) ready.push(i);

  const claimed = new Set<string>();
  const resolved: boolean[] = new Array(n).fill(false);
  const finalPositions: Cell[] = positions.map((p) => [p[0], p[1]]);

  while (ready.length > 0) {
    let k = 0;
    for (let m = 1; m < ready.length; m++) {
      if (ready[m] < ready[k]) k = m;
    }
    const [i] = ready.splice(k, 1);

    const target = targets[i];
    const key = cellKey(target);
    if (!claimed.has(key)) {
      claimed.add(key);
      finalPositions[i] = [target[0], target[1]];
    } else {
      // 늦게 결정된 로봇은 충돌 대신 제자리로 밀려남
      claimed.add(cellKey(positions[i]));
    }
    resolved[i] = true;
    for (const w of waiters[i]) ready.push(w);
  }

  const deadlocked: number[] = [];
  for (let i = 0; i < n; i++) if (!resolved[i]) deadlocked.push(i);

  const moved = finalPositions.map((p, i) => !sameCell(p, positions[i]));
  return { finalPositions, moved, deadlocked };
}
