import { sameCell } from "../grid/grid.js";
import { PackageStatus, type PackageState } from "../domain/package.js";
import type { RobotState } from "../domain/robot.js";
import { PackageAction } from "../domain/actions.js";

export type RewardConfig = {
  moveCost: number;
  deliveryReward: number;
  delayReward: number;
};

export type Delivery = {
  packageId: number;
  onTime: boolean;
  reward: number;
};

export type PackageEvent =
  | { kind: "pickup"; packageId: number }
  | ({ kind: "delivery" } & Delivery);

/**
 * spawnTime === tick 인 PENDING 패키지를 WAITING으로 전환.
 * 새로 공개된 패키지를 id 순서로 반환한다.
 */
export function revealPackages(
  packages: PackageState[],
  tick: number,
): PackageState[] {
  const revealed: PackageState[] = [];
  for (const pkg of packages) {
    if (pkg.status === PackageStatus.PENDING && pkg.spawnTime === tick) {
      pkg.status = PackageStatus.WAITING;
      revealed.push(pkg);
    }
  }
  return revealed;
}

/** 빈손 로봇이 현재 칸의 대기 패키지 중 id가 가장 작은 것을 집는다. 집은 id 또는 null. */
export function tryPickup(
  robot: RobotState,
  packages: PackageState[],
  tick: number,
): number | null {
  if (robot.carrying != null) return null;
  for (const pkg of packages) {
    if (
      pkg.status === PackageStatus.WAITING &&
      sameCell(pkg.start, robot.position) &&
      pkg.spawnTime <= tick
    ) {
      pkg.status = PackageStatus.IN_TRANSIT;
      robot.carrying = pkg.id;
      return pkg.id;
    }
  }
  return null;
}

/** 목표 칸에서만 배달 성공. 목표가 아니면 계속 들고 있다. */
export function tryDrop(
  robot: RobotState,
  packages: PackageState[],
  tick: number,
  rewards: RewardConfig,
): Delivery | null {
  if (robot.carrying == null) return null;
  const carriedId = robot.carrying;
  const pkg = packages.find((p) => p.id === carriedId);
  if (!pkg) {
    throw new Error(`Robot carries unknown package ${carriedId}`);
  }
  if (!sameCell(robot.position, pkg.target)) return null;

  pkg.status = PackageStatus.DELIVERED;
  robot.carrying = null;
  const onTime = tick <= pkg.deadline;
  return {
    packageId: pkg.id,
    onTime,
    reward: onTime ? rewards.deliveryReward : rewards.delayReward,
  };
}

export function applyPackageAction(
  robot: RobotState,
  action: PackageAction,
  packages: PackageState[],
  tick: number,
  rewards: RewardConfig,
): PackageEvent | null {
  switch (action) {
    case PackageAction.PICKUP: {
      const packageId = tryPickup(robot, packages, tick);
      return packageId == null ? null : { kind: "pickup", packageId };
    }
    case PackageAction.DROP: {
      const delivery = tryDrop(robot, packages, tick, rewards);
      return delivery ? { kind: "delivery", ...delivery } : null;
    }
    case PackageAction.NONE:
      return null;
  }
}
