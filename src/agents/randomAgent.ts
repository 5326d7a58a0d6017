import { Move, PackageAction, type RobotAction } from "../domain/actions.js";
import { createRandomSource, type RandomSource } from "../sim/rng.js";
import type { Snapshot } from "../sim/snapshot.js";
import type { AgentPolicy } from "./types.js";

const MOVES: readonly Move[] = Object.values(Move);
const PACKAGE_ACTIONS: readonly PackageAction[] = Object.values(PackageAction);

/** 기준선 정책: 로봇마다 이동·패키지 행동을 균등하게 뽑는다. */
export class RandomAgent implements AgentPolicy {
  readonly name = "random";

  private rng: RandomSource;
  private robotCount = 0;

  constructor(seed: number | string) {
    this.rng = createRandomSource(seed);
  }

  init(snapshot: Snapshot): void {
    this.robotCount = snapshot.robots.length;
  }

  getActions(_snapshot: Snapshot): RobotAction[] {
    return Array.from({ length: this.robotCount }, (): RobotAction => [
      MOVES[this.rng.randInt(0, MOVES.length)],
      PACKAGE_ACTIONS[this.rng.randInt(0, PACKAGE_ACTIONS.length)],
    ]);
  }
}
