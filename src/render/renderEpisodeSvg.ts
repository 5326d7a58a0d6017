import {
  BACKGROUND_COLOR,
  CELL_SIZE,
  FRAME_MARGIN,
  GAP,
  TICK_TIME_S,
} from "../config/constants.js";
import { composeSvg } from "./composeSvg.js";
import {
  buildPackageLayer,
  buildRobotLayer,
  buildTileLayer,
  type LayerTiming,
} from "./layers.js";
import type { EpisodeRecording } from "./types.js";

export type RenderOptions = {
  /** 1틱 길이(초) */
  tickTimeS?: number;
  /** true면 애니메이션 무한 반복 */
  loop?: boolean;
  /** 출력 크기 배율 */
  scale?: number;
};

const HUD_HEIGHT = 14;

// ---- renderEpisodeSvg (메인) ----
export function renderEpisodeSvg(
  recording: EpisodeRecording,
  options: RenderOptions = {},
): string {
  const { grid, frames, packages } = recording;
  const { tickTimeS = TICK_TIME_S, loop = true, scale = 2 } = options;

  // ----- 그리드 크기·레이아웃 -----
  const gridWidth = grid.cols * (CELL_SIZE + GAP) - GAP;
  const gridHeight = grid.rows * (CELL_SIZE + GAP) - GAP;
  const gridLeftX = FRAME_MARGIN;
  const gridTopY = FRAME_MARGIN;
  const totalWidth = gridWidth + FRAME_MARGIN * 2;
  const totalHeight = gridHeight + FRAME_MARGIN * 2 + HUD_HEIGHT;

  // 마지막 프레임도 한 틱 동안 보이도록
  const lastTick = frames.length > 0 ? frames[frames.length - 1].tick : 0;
  const totalS = Math.max(tickTimeS, (lastTick + 1) * tickTimeS);
  const timing: LayerTiming = { gridLeftX, gridTopY, tickTimeS, totalS, loop };

  const tileRects = buildTileLayer({ grid, gridLeftX, gridTopY });
  const { packageGroups, packageKeyframes } = buildPackageLayer({
    packages,
    timing,
  });
  const { robotGroups, robotKeyframes } = buildRobotLayer({ frames, timing });

  const delivered = packages.filter((p) => p.deliveryTick != null).length;
  const finalReward =
    frames.length > 0 ? frames[frames.length - 1].totalReward : 0;
  const hud = `<text x="${gridLeftX}" y="${totalHeight - 6}" fill="#8b949e" font-family="monospace" font-size="8">ticks ${lastTick} · delivered ${delivered}/${packages.length} · reward ${finalReward.toFixed(2)}</text>`;

  return composeSvg({
    totalWidth,
    totalHeight,
    displayWidth: totalWidth * scale,
    displayHeight: totalHeight * scale,
    backgroundColor: BACKGROUND_COLOR,
    tileRects,
    packageGroups,
    robotGroups,
    keyframes: packageKeyframes + robotKeyframes,
    hud,
  });
}
