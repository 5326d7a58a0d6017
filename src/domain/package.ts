import type { Cell } from "../grid/grid.js";

/** 패키지 상태 머신 단계. 순서대로만 진행되고 되돌아가지 않는다. */
export enum PackageStatus {
  PENDING = "PENDING",
  WAITING = "WAITING",
  IN_TRANSIT = "IN_TRANSIT",
  DELIVERED = "DELIVERED",
}

export const STATUS_RANK: Record<PackageStatus, number> = {
  [PackageStatus.PENDING]: 0,
  [PackageStatus.WAITING]: 1,
  [PackageStatus.IN_TRANSIT]: 2,
  [PackageStatus.DELIVERED]: 3,
};

export type PackageState = {
  id: number;
  start: Cell;
  target: Cell;
  spawnTime: number;
  deadline: number;
  status: PackageStatus;
};

export const clonePackage = (pkg: PackageState): PackageState => ({
  ...pkg,
  start: [pkg.start[0], pkg.start[1]],
  target: [pkg.target[0], pkg.target[1]],
});
