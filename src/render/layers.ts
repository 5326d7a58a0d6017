import type { Grid } from "../grid/grid.js";
import { FREE } from "../grid/grid.js";
import {
  BACKGROUND_COLOR,
  BORDER_RADIUS,
  CELL_SIZE,
  PACKAGE_FILL,
  PACKAGE_SIZE,
  ROBOT_COLORS,
  ROBOT_RADIUS,
  TARGET_STROKE,
  TILE_FREE,
  TILE_OBSTACLE,
} from "../config/constants.js";
import { getCellCenterPx, getCellOriginPx, tickToPct } from "./layout.js";
import type { EpisodeFrame, PackageTimeline } from "./types.js";

export type LayerTiming = {
  gridLeftX: number;
  gridTopY: number;
  tickTimeS: number;
  totalS: number;
  /** 무한 반복 여부 */
  loop: boolean;
};

export const robotColor = (index: number): string =>
  ROBOT_COLORS[index % ROBOT_COLORS.length];

const iteration = (loop: boolean) => (loop ? "infinite" : "1");

/** 빈 칸·장애물 타일 (정적) */
export function buildTileLayer(params: {
  grid: Grid;
  gridLeftX: number;
  gridTopY: number;
}): string {
  const { grid, gridLeftX, gridTopY } = params;
  const rects: string[] = [];
  for (let r = 0; r < grid.rows; r++) {
    for (let c = 0; c < grid.cols; c++) {
      const { x, y } = getCellOriginPx(gridLeftX, gridTopY, r, c);
      const fill = grid.cells[r][c] === FREE ? TILE_FREE : TILE_OBSTACLE;
      rects.push(
        `<rect x="${x}" y="${y}" width="${CELL_SIZE}" height="${CELL_SIZE}" fill="${fill}" rx="${BORDER_RADIUS}"/>`,
      );
    }
  }
  return rects.join("\n  ");
}

/**
 * from 틱에 나타나 to 틱에 사라지는 opacity 키프레임 (step-end 전제).
 * to가 null이면 끝까지 보인다.
 */
function visibilityKeyframes(
  name: string,
  from: number,
  to: number | null,
  timing: LayerTiming,
): string {
  const p0 = tickToPct(from, timing.tickTimeS, timing.totalS);
  const entries: string[] = [];
  if (p0 > 0) {
    entries.push(`0% { opacity: 0; }`);
    entries.push(`${p0.toFixed(4)}% { opacity: 1; }`);
  } else {
    entries.push(`0% { opacity: 1; }`);
  }
  if (to != null) {
    const p1 = tickToPct(to, timing.tickTimeS, timing.totalS);
    entries.push(`${p1.toFixed(4)}% { opacity: 0; }`);
    entries.push(`100% { opacity: 0; }`);
  } else {
    entries.push(`100% { opacity: 1; }`);
  }
  return `
  @keyframes ${name} {
    ${entries.join("\n    ")}
  }`;
}

// 픽업·배달은 그 틱의 step 끝에 일어나므로 다음 프레임부터 사라진다
const afterTick = (tick: number | null) => (tick == null ? null : tick + 1);

/**
 * 패키지 레이어: 시작 칸 사각형(등장 ~ 픽업), 목표 칸 테두리(등장 ~ 배달).
 */
export function buildPackageLayer(params: {
  packages: PackageTimeline[];
  timing: LayerTiming;
}): { packageGroups: string; packageKeyframes: string } {
  const { packages, timing } = params;
  const groups: string[] = [];
  const keyframes: string[] = [];
  const anim = (name: string) =>
    `animation: ${name} ${timing.totalS}s step-end 0s ${iteration(timing.loop)} both`;

  for (const pkg of packages) {
    const start = getCellCenterPx(
      timing.gridLeftX,
      timing.gridTopY,
      pkg.start[0],
      pkg.start[1],
    );
    const target = getCellOriginPx(
      timing.gridLeftX,
      timing.gridTopY,
      pkg.target[0],
      pkg.target[1],
    );
    const startName = `pkg-start-${pkg.id}`;
    const targetName = `pkg-target-${pkg.id}`;
    keyframes.push(
      visibilityKeyframes(
        startName,
        pkg.spawnTime,
        afterTick(pkg.pickupTick),
        timing,
      ),
    );
    keyframes.push(
      visibilityKeyframes(
        targetName,
        pkg.spawnTime,
        afterTick(pkg.deliveryTick),
        timing,
      ),
    );
    const half = PACKAGE_SIZE / 2;
    groups.push(
      `<rect x="${start.x - half}" y="${start.y - half}" width="${PACKAGE_SIZE}" height="${PACKAGE_SIZE}" fill="${PACKAGE_FILL}" style="${anim(startName)}"/>`,
    );
    groups.push(
      `<rect x="${target.x + 0.5}" y="${target.y + 0.5}" width="${CELL_SIZE - 1}" height="${CELL_SIZE - 1}" fill="none" stroke="${TARGET_STROKE}" stroke-width="1" style="${anim(targetName)}"/>`,
    );
  }
  return {
    packageGroups: groups.join("\n  "),
    packageKeyframes: keyframes.join(""),
  };
}

/**
 * 로봇 레이어: 프레임마다 셀 중앙으로 translate 키프레임.
 * 위치가 바뀌지 않는 구간은 키프레임을 생략한다.
 * 패키지를 들고 있는 동안에는 안쪽에 작은 사각형이 보인다.
 */
export function buildRobotLayer(params: {
  frames: EpisodeFrame[];
  timing: LayerTiming;
}): { robotGroups: string; robotKeyframes: string } {
  const { frames, timing } = params;
  if (frames.length === 0) return { robotGroups: "", robotKeyframes: "" };

  const robotCount = frames[0].positions.length;
  const groups: string[] = [];
  const keyframes: string[] = [];
  const center = (row: number, col: number) =>
    getCellCenterPx(timing.gridLeftX, timing.gridTopY, row, col);

  for (let i = 0; i < robotCount; i++) {
    const moveEntries: string[] = [];
    const cargoEntries: string[] = [];
    let prevKey = "";
    let prevCarrying: boolean | null = null;

    frames.forEach((frame, k) => {
      const [row, col] = frame.positions[i];
      const { x, y } = center(row, col);
      const key = `${x},${y}`;
      const pct = tickToPct(frame.tick, timing.tickTimeS, timing.totalS);
      if (key !== prevKey || k === frames.length - 1) {
        // 직전 위치를 이 틱 직전까지 유지 → 한 틱 동안 선형 이동
        if (k > 0 && key !== prevKey) {
          const prev = frames[k - 1];
          const hold = tickToPct(prev.tick, timing.tickTimeS, timing.totalS);
          const [pr, pc] = prev.positions[i];
          const p = center(pr, pc);
          moveEntries.push(
            `${hold.toFixed(4)}% { transform: translate(${p.x}px, ${p.y}px); }`,
          );
        }
        moveEntries.push(
          `${pct.toFixed(4)}% { transform: translate(${x}px, ${y}px); }`,
        );
        prevKey = key;
      }
      const carrying = frame.carrying[i] != null;
      if (carrying !== prevCarrying) {
        cargoEntries.push(
          `${pct.toFixed(4)}% { opacity: ${carrying ? 1 : 0}; }`,
        );
        prevCarrying = carrying;
      }
    });

    const moveName = `robot-${i}`;
    const cargoName = `robot-cargo-${i}`;
    keyframes.push(`
  @keyframes ${moveName} {
    ${moveEntries.join("\n    ")}
  }`);
    keyframes.push(`
  @keyframes ${cargoName} {
    ${cargoEntries.join("\n    ")}
  }`);

    const [row0, col0] = frames[0].positions[i];
    const p0 = center(row0, col0);
    const loop = iteration(timing.loop);
    const moveAnim = `animation: ${moveName} ${timing.totalS}s linear 0s ${loop} both`;
    const cargoAnim = `animation: ${cargoName} ${timing.totalS}s step-end 0s ${loop} both`;
    const half = PACKAGE_SIZE / 2 - 1;
    groups.push(`<g transform="translate(${p0.x}, ${p0.y})" style="${moveAnim}">
    <circle cx="0" cy="0" r="${ROBOT_RADIUS}" fill="${robotColor(i)}"/>
    <rect x="${-half}" y="${-half}" width="${half * 2}" height="${half * 2}" fill="${BACKGROUND_COLOR}" style="${cargoAnim}"/>
  </g>`);
  }

  return {
    robotGroups: groups.join("\n  "),
    robotKeyframes: keyframes.join(""),
  };
}
