import {
  cellKey,
  freeCells,
  inBounds,
  isFree,
  sameCell,
  type Cell,
  type Grid,
} from "../grid/grid.js";
import type { RobotState } from "../domain/robot.js";
import { PackageStatus, type PackageState } from "../domain/package.js";
import type { RandomSource } from "./rng.js";
import { ConfigurationError, InvalidPlacementError } from "./errors.js";
import {
  DEADLINE_BASE_SLACK,
  MAX_INITIAL_PACKAGES,
} from "../config/constants.js";

export type Scenario = {
  robots: RobotState[];
  packages: PackageState[];
};

export type ScenarioParams = {
  grid: Grid;
  robotCount: number;
  packageCount: number;
  horizon: number;
  rng: RandomSource;
};

/** 고정 시나리오 입력 (테스트·재현용). 셀은 0-based. */
export type ScenarioInput = {
  robots: Cell[];
  packages: {
    id: number;
    start: Cell;
    target: Cell;
    spawnTime: number;
    deadline: number;
  }[];
};

type PackageDraft = {
  start: Cell;
  target: Cell;
  spawnTime: number;
  deadline: number;
};

/**
 * 에피소드 시작 시 로봇·패키지를 배치한다.
 *
 * 난수 소비 순서는 고정: 로봇 R개 → 패키지마다 (start, target 재추첨, slack, spawnTime).
 * 같은 grid·seed면 언제나 같은 시나리오가 나온다.
 */
export function generateScenario(params: ScenarioParams): Scenario {
  const { grid, robotCount, packageCount, horizon, rng } = params;

  if (!Number.isInteger(robotCount) || robotCount < 0) {
    throw new ConfigurationError(`Invalid robot count ${robotCount}`);
  }
  if (!Number.isInteger(packageCount) || packageCount < 0) {
    throw new ConfigurationError(`Invalid package count ${packageCount}`);
  }

  const free = freeCells(grid);
  if (free.length < robotCount) {
    throw new ConfigurationError(
      `Not enough free cells for ${robotCount} robots (${free.length} available)`,
      { freeCells: free.length, robots: robotCount },
    );
  }
  if (packageCount > 0 && free.length < 2) {
    throw new ConfigurationError(
      "At least two free cells are required to place packages",
      { freeCells: free.length },
    );
  }
  const initialCount = Math.min(robotCount, MAX_INITIAL_PACKAGES);
  if (packageCount > initialCount && horizon < 2) {
    throw new ConfigurationError(
      `Horizon ${horizon} leaves no tick for late-spawning packages`,
      { horizon },
    );
  }

  // 비복원 추출: 뽑힌 칸은 후보에서 제거 (row-major 순서 유지)
  const candidates = [...free];
  const robots: RobotState[] = [];
  for (let i = 0; i < robotCount; i++) {
    const k = rng.randInt(0, candidates.length);
    const [cell] = candidates.splice(k, 1);
    robots.push({ position: cell, carrying: null });
  }

  const n = grid.rows;
  const drafts: PackageDraft[] = [];
  for (let i = 0; i < packageCount; i++) {
    const start = free[rng.randInt(0, free.length)];
    let target = free[rng.randInt(0, free.length)];
    while (sameCell(start, target)) {
      target = free[rng.randInt(0, free.length)];
    }
    const slack = DEADLINE_BASE_SLACK + rng.randInt(Math.floor(n / 2), 3 * n);
    const spawnTime = i < initialCount ? 0 : rng.randInt(1, horizon);
    drafts.push({
      start: [start[0], start[1]],
      target: [target[0], target[1]],
      spawnTime,
      deadline: spawnTime + slack,
    });
  }

  // 안정 정렬: 같은 spawnTime이면 생성 순서 유지
  drafts.sort((a, b) => a.spawnTime - b.spawnTime);
  const packages: PackageState[] = drafts.map((d, i) => ({
    id: i + 1,
    ...d,
    status: PackageStatus.PENDING,
  }));

  return { robots, packages };
}

/** 고정 시나리오 검증 후 초기 상태로 변환 */
export function validateScenario(grid: Grid, input: ScenarioInput): Scenario {
  const seen = new Set<string>();
  const robots: RobotState[] = input.robots.map((cell, i) => {
    if (!isFree(grid, cell)) {
      const where = inBounds(grid, cell) ? "on an obstacle" : "outside the grid";
      throw new InvalidPlacementError(
        `Robot ${i} placed ${where} at (${cell[0]}, ${cell[1]})`,
        cell,
      );
    }
    const key = cellKey(cell);
    if (seen.has(key)) {
      throw new InvalidPlacementError(
        `Robot ${i} placed on an occupied cell (${cell[0]}, ${cell[1]})`,
        cell,
      );
    }
    seen.add(key);
    return { position: [cell[0], cell[1]], carrying: null };
  });

  let prevSpawn = -Infinity;
  const packages: PackageState[] = input.packages.map((p, i) => {
    const fail = (reason: string): never => {
      throw new ConfigurationError(`Package ${p.id}: ${reason}`, {
        packageId: p.id,
      });
    };
    if (p.id !== i + 1) fail(`expected id ${i + 1}`);
    if (!isFree(grid, p.start)) fail("start is not a free cell");
    if (!isFree(grid, p.target)) fail("target is not a free cell");
    if (sameCell(p.start, p.target)) fail("target equals start");
    if (!Number.isInteger(p.spawnTime) || p.spawnTime < 0) {
      fail(`invalid spawn time ${p.spawnTime}`);
    }
    if (p.deadline <= p.spawnTime) fail("deadline must be after spawn time");
    if (p.spawnTime < prevSpawn) fail("ids must follow ascending spawn time");
    prevSpawn = p.spawnTime;
    return {
      id: p.id,
      start: [p.start[0], p.start[1]],
      target: [p.target[0], p.target[1]],
      spawnTime: p.spawnTime,
      deadline: p.deadline,
      status: PackageStatus.PENDING,
    };
  });

  return { robots, packages };
}
