import type { Cell, Grid } from "../grid/grid.js";
import {
  isDirectional,
  isMove,
  isPackageAction,
  type RobotAction,
} from "../domain/actions.js";
import { cloneRobot, type RobotState } from "../domain/robot.js";
import {
  clonePackage,
  PackageStatus,
  type PackageState,
} from "../domain/package.js";
import { createRandomSource, type RandomSource } from "./rng.js";
import {
  generateScenario,
  validateScenario,
  type Scenario,
  type ScenarioInput,
} from "./scenario.js";
import { resolveMovement } from "./movement.js";
import {
  applyPackageAction,
  revealPackages,
  type RewardConfig,
} from "./packages.js";
import { buildSnapshot, type Snapshot } from "./snapshot.js";
import { ConfigurationError, InvalidInvocationError } from "./errors.js";
import {
  DEFAULT_DELAY_REWARD,
  DEFAULT_DELIVERY_REWARD,
  DEFAULT_MOVE_COST,
  DEFAULT_SEED,
} from "../config/constants.js";

export type EnvironmentOptions = {
  grid: Grid;
  robotCount: number;
  packageCount: number;
  /** 최대 틱 수. tick이 이 값에 도달하면 에피소드 종료 */
  horizon: number;
  rewards?: Partial<RewardConfig>;
  seed?: number | string;
};

export type StepEvent =
  | { kind: "move"; robot: number; from: Cell; to: Cell }
  | { kind: "pickup"; robot: number; packageId: number }
  | {
      kind: "delivery";
      robot: number;
      packageId: number;
      onTime: boolean;
      reward: number;
    };

export type EpisodeInfo = {
  totalReward: number;
  totalTimeSteps: number;
};

export type StepResult = {
  snapshot: Snapshot;
  reward: number;
  done: boolean;
  /** done일 때만 채워진다 */
  info: EpisodeInfo | Record<string, never>;
  events: StepEvent[];
};

const isActionPair = (value: unknown): boolean =>
  Array.isArray(value) && value.length === 2;

/**
 * 배달 시뮬레이션 상태의 유일한 소유자.
 * reset()/load()로 에피소드를 시작하고 step()으로 한 틱씩 진행한다.
 */
export class DeliveryEnvironment {
  readonly grid: Grid;
  readonly robotCount: number;
  readonly packageCount: number;
  readonly horizon: number;
  readonly rewards: RewardConfig;

  private rng: RandomSource;
  private state: {
    tick: number;
    totalReward: number;
    robots: RobotState[];
    packages: PackageState[];
    done: boolean;
  } | null = null;

  constructor(options: EnvironmentOptions) {
    if (!Number.isInteger(options.horizon) || options.horizon < 1) {
      throw new ConfigurationError(`Invalid horizon ${options.horizon}`, {
        horizon: options.horizon,
      });
    }
    this.grid = options.grid;
    this.robotCount = options.robotCount;
    this.packageCount = options.packageCount;
    this.horizon = options.horizon;
    this.rewards = {
      moveCost: options.rewards?.moveCost ?? DEFAULT_MOVE_COST,
      deliveryReward: options.rewards?.deliveryReward ?? DEFAULT_DELIVERY_REWARD,
      delayReward: options.rewards?.delayReward ?? DEFAULT_DELAY_REWARD,
    };
    this.rng = createRandomSource(options.seed ?? DEFAULT_SEED);
  }

  /** 새 랜덤 시나리오로 에피소드 시작. 난수원은 생성자에서 한 번만 시드된다. */
  reset(): Snapshot {
    const scenario = generateScenario({
      grid: this.grid,
      robotCount: this.robotCount,
      packageCount: this.packageCount,
      horizon: this.horizon,
      rng: this.rng,
    });
    return this.begin(scenario);
  }

  /** 고정 시나리오로 에피소드 시작. 로봇·패키지 수는 생성자 값과 같아야 한다. */
  load(input: ScenarioInput): Snapshot {
    if (input.robots.length !== this.robotCount) {
      throw new ConfigurationError(
        `Scenario has ${input.robots.length} robots, expected ${this.robotCount}`,
        { robots: input.robots.length, expected: this.robotCount },
      );
    }
    if (input.packages.length !== this.packageCount) {
      throw new ConfigurationError(
        `Scenario has ${input.packages.length} packages, expected ${this.packageCount}`,
        { packages: input.packages.length, expected: this.packageCount },
      );
    }
    return this.begin(validateScenario(this.grid, input));
  }

  step(actions: readonly RobotAction[]): StepResult {
    const state = this.state;
    if (!state) {
      throw new InvalidInvocationError("step() called before reset()");
    }
    if (state.done) {
      throw new InvalidInvocationError("step() called after the episode ended");
    }
    if (actions.length !== state.robots.length) {
      throw new InvalidInvocationError(
        `Expected ${state.robots.length} actions, received ${actions.length}`,
        state.robots.length,
        actions.length,
      );
    }
    actions.forEach((action, i) => {
      if (!isActionPair(action)) {
        throw new InvalidInvocationError(
          `Robot ${i}: expected a [move, packageAction] pair`,
        );
      }
      const [move, packageAction] = action;
      if (!isMove(move)) {
        throw new InvalidInvocationError(`Robot ${i}: unknown move "${move}"`);
      }
      if (!isPackageAction(packageAction)) {
        throw new InvalidInvocationError(
          `Robot ${i}: unknown package action "${packageAction}"`,
        );
      }
    });

    const events: StepEvent[] = [];
    let reward = 0;

    // ---- 이동 ----
    const before = state.robots.map((r) => r.position);
    const { finalPositions, moved } = resolveMovement(
      this.grid,
      before,
      actions.map(([move]) => move),
    );
    state.robots.forEach((robot, i) => {
      if (isDirectional(actions[i][0]) && moved[i]) {
        reward += this.rewards.moveCost;
        events.push({
          kind: "move",
          robot: i,
          from: before[i],
          to: finalPositions[i],
        });
      }
      robot.position = finalPositions[i];
    });

    // ---- 패키지 (이동 후 위치 기준, 로봇 인덱스 순) ----
    state.robots.forEach((robot, i) => {
      const event = applyPackageAction(
        robot,
        actions[i][1],
        state.packages,
        state.tick,
        this.rewards,
      );
      if (!event) return;
      if (event.kind === "delivery") reward += event.reward;
      events.push({ ...event, robot: i });
    });

    state.tick += 1;
    state.totalReward += reward;

    const done = this.isTerminal();
    state.done = done;
    const revealed = revealPackages(state.packages, state.tick);
    return {
      snapshot: buildSnapshot(state.tick, this.grid, state.robots, revealed),
      reward,
      done,
      info: done
        ? { totalReward: state.totalReward, totalTimeSteps: state.tick }
        : {},
      events,
    };
  }

  get tick(): number {
    return this.state?.tick ?? 0;
  }

  get totalReward(): number {
    return this.state?.totalReward ?? 0;
  }

  get done(): boolean {
    return this.state?.done ?? false;
  }

  get robots(): RobotState[] {
    return (this.state?.robots ?? []).map(cloneRobot);
  }

  get packages(): PackageState[] {
    return (this.state?.packages ?? []).map(clonePackage);
  }

  private begin(scenario: Scenario): Snapshot {
    const revealed = revealPackages(scenario.packages, 0);
    this.state = {
      tick: 0,
      totalReward: 0,
      robots: scenario.robots,
      packages: scenario.packages,
      done: false,
    };
    return buildSnapshot(0, this.grid, scenario.robots, revealed);
  }

  private isTerminal(): boolean {
    if (!this.state) return false;
    if (this.state.tick === this.horizon) return true;
    return this.state.packages.every(
      (p) => p.status === PackageStatus.DELIVERED,
    );
  }
}
