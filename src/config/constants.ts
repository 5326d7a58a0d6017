// 공통 상수 정의 (시뮬레이션 + SVG 렌더 공용)

// ---- 에피소드 기본값 ----
export const DEFAULT_MAX_TIME_STEPS = 100;
export const DEFAULT_ROBOTS = 5;
export const DEFAULT_PACKAGES = 20;
export const DEFAULT_SEED = 2025;
export const DEFAULT_MAP_FILE = "maps/map1.txt";
export const DEFAULT_OUT_DIR = "out";

// ---- 보상 ----
// 실제로 이동한 로봇에만 부과 (막히거나 밀려난 이동은 0)
export const DEFAULT_MOVE_COST = -0.01;
export const DEFAULT_DELIVERY_REWARD = 10;
// 마감 이후 배달도 양수 보상 (감점 아님)
export const DEFAULT_DELAY_REWARD = 1;

// ---- 시나리오 생성 ----
// deadline = spawnTime + DEADLINE_BASE_SLACK + randInt(N/2, 3N), N = 행 수
export const DEADLINE_BASE_SLACK = 10;
// 처음 min(로봇 수, 이 값)개 패키지는 tick 0에 등장
export const MAX_INITIAL_PACKAGES = 20;

// ---- SVG ----
export const CELL_SIZE = 10;
export const GAP = 2;
export const BORDER_RADIUS = 2;
export const FRAME_MARGIN = CELL_SIZE + GAP;
export const BACKGROUND_COLOR = "#0d1117";
export const TILE_FREE = "#161b22";
export const TILE_OBSTACLE = "#484f58";
export const TARGET_STROKE = "#e3b341";
// 1틱 = 1칸 이동 = 이 시간(초)
export const TICK_TIME_S = 0.4;
// 로봇 마커 반지름(px)
export const ROBOT_RADIUS = 4;
export const PACKAGE_SIZE = 5;
export const PACKAGE_FILL = "#f0883e";

export const ROBOT_COLORS = [
  "#58a6ff",
  "#f78166",
  "#3fb950",
  "#d2a8ff",
  "#ffa657",
  "#79c0ff",
  "#ff7b72",
  "#56d364",
  "#bc8cff",
  "#e3b341",
] as const;
