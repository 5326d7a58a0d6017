import type { Cell } from "../grid/grid.js";

/** 시뮬레이션용 로봇 상태. carrying = 들고 있는 패키지 id, 빈손이면 null */
export type RobotState = {
  position: Cell;
  carrying: number | null;
};

export const cloneRobot = (robot: RobotState): RobotState => ({
  position: [robot.position[0], robot.position[1]],
  carrying: robot.carrying,
});
