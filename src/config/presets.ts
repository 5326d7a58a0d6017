/**
 * SVG 타이밍 프리셋.
 * renderEpisodeSvg(..., options)에 넘길 때 사용.
 */
export const RENDER_PRESET_NAMES = ["default", "fast", "slow"] as const;

export type RenderPresetName = (typeof RENDER_PRESET_NAMES)[number];

/** RenderOptions와 동일한 키 (일부만 지정 가능) */
export type RenderPreset = Partial<{
  tickTimeS: number;
  loop: boolean;
}>;

export const PRESET_DEFAULT: RenderPreset = {};

/** 긴 에피소드 미리보기용 */
export const PRESET_FAST: RenderPreset = {
  tickTimeS: 0.15,
};

/** 충돌 해석을 눈으로 따라갈 때 */
export const PRESET_SLOW: RenderPreset = {
  tickTimeS: 1,
  loop: false,
};

export const PRESETS: Record<RenderPresetName, RenderPreset> = {
  default: PRESET_DEFAULT,
  fast: PRESET_FAST,
  slow: PRESET_SLOW,
};
