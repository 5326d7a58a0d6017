import { InvalidInvocationError } from "../sim/errors.js";

/** 이동 명령. 값은 와이어 포맷 문자 그대로 (S/L/R/U/D). */
export enum Move {
  STAY = "S",
  LEFT = "L",
  RIGHT = "R",
  UP = "U",
  DOWN = "D",
}

/** 패키지 명령. 0 = 없음, 1 = 집기, 2 = 내려놓기 */
export enum PackageAction {
  NONE = "0",
  PICKUP = "1",
  DROP = "2",
}

export type RobotAction = [move: Move, packageAction: PackageAction];

/** (dRow, dCol) */
export const MOVE_DELTAS: Record<Move, [number, number]> = {
  [Move.STAY]: [0, 0],
  [Move.LEFT]: [0, -1],
  [Move.RIGHT]: [0, 1],
  [Move.UP]: [-1, 0],
  [Move.DOWN]: [1, 0],
};

export const DIRECTIONAL_MOVES: readonly Move[] = [
  Move.LEFT,
  Move.RIGHT,
  Move.UP,
  Move.DOWN,
];

export const isDirectional = (move: Move): boolean => move !== Move.STAY;

const MOVE_CHARS: readonly string[] = Object.values(Move);
const PACKAGE_ACTION_CHARS: readonly string[] = Object.values(PackageAction);

export function isMove(value: string): value is Move {
  return MOVE_CHARS.includes(value);
}

export function isPackageAction(value: string): value is PackageAction {
  return PACKAGE_ACTION_CHARS.includes(value);
}

/** ["R", "1"] 같은 와이어 포맷을 RobotAction으로 변환 */
export function parseAction(move: string, packageAction: string): RobotAction {
  if (!isMove(move)) {
    throw new InvalidInvocationError(`Unknown move "${move}"`);
  }
  if (!isPackageAction(packageAction)) {
    throw new InvalidInvocationError(
      `Unknown package action "${packageAction}"`,
    );
  }
  return [move, packageAction];
}
