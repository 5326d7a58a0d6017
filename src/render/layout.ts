/**
 * 그리드 레이아웃
 *
 * - 셀 좌표(row, col) → 픽셀 위치 변환
 * - 셀/간격 크기는 config/constants 기준
 */

import { CELL_SIZE, GAP } from "../config/constants.js";

/** 셀 (row, col)의 왼쪽 위 픽셀 좌표 */
export function getCellOriginPx(
  gridLeftX: number,
  gridTopY: number,
  row: number,
  col: number,
): { x: number; y: number } {
  return {
    x: gridLeftX + col * (CELL_SIZE + GAP),
    y: gridTopY + row * (CELL_SIZE + GAP),
  };
}

/**
 * 셀 (row, col)의 정중앙 픽셀 좌표.
 * - 로봇·패키지 마커 위치 계산에 사용.
 */
export function getCellCenterPx(
  gridLeftX: number,
  gridTopY: number,
  row: number,
  col: number,
): { x: number; y: number } {
  const { x, y } = getCellOriginPx(gridLeftX, gridTopY, row, col);
  return { x: x + CELL_SIZE / 2, y: y + CELL_SIZE / 2 };
}

/** 틱 → 애니메이션 전체 길이 대비 퍼센트 (0~100) */
export function tickToPct(tick: number, tickTimeS: number, totalS: number): number {
  if (totalS <= 0) return 0;
  return Math.max(0, Math.min(100, ((tick * tickTimeS) / totalS) * 100));
}
