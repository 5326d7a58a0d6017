import type { Cell, Grid } from "../grid/grid.js";

/** 한 틱이 끝난 시점의 로봇 배치 (frames[0] = reset 직후) */
export type EpisodeFrame = {
  tick: number;
  positions: Cell[];
  carrying: (number | null)[];
  totalReward: number;
};

/** 패키지별 등장·픽업·배달 틱. 일어나지 않았으면 null */
export type PackageTimeline = {
  id: number;
  start: Cell;
  target: Cell;
  spawnTime: number;
  deadline: number;
  pickupTick: number | null;
  deliveryTick: number | null;
};

export type EpisodeRecording = {
  grid: Grid;
  frames: EpisodeFrame[];
  packages: PackageTimeline[];
};
