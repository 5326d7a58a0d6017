import type { Snapshot } from "../sim/snapshot.js";
import type { RobotAction } from "../domain/actions.js";

/** 스냅샷을 보고 로봇마다 (이동, 패키지 행동)을 고르는 정책 */
export interface AgentPolicy {
  readonly name: string;
  init(snapshot: Snapshot): void;
  getActions(snapshot: Snapshot): RobotAction[];
}
