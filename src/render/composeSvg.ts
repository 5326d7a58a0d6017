export function composeSvg(params: {
  totalWidth: number;
  totalHeight: number;
  /** 출력 SVG의 width. 없으면 totalWidth 사용 */
  displayWidth?: number;
  /** 출력 SVG의 height. 없으면 totalHeight 사용 */
  displayHeight?: number;
  backgroundColor: string;
  tileRects: string;
  packageGroups: string;
  robotGroups: string;
  keyframes: string;
  hud: string;
}): string {
  const {
    totalWidth,
    totalHeight,
    displayWidth = totalWidth,
    displayHeight = totalHeight,
    backgroundColor,
    tileRects,
    packageGroups,
    robotGroups,
    keyframes,
    hud,
  } = params;

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" width="${displayWidth}" height="${displayHeight}" viewBox="0 0 ${totalWidth} ${totalHeight}">
  <defs>
    <style>
  ${keyframes}
    </style>
  </defs>
  <rect x="0" y="0" width="${totalWidth}" height="${totalHeight}" fill="${backgroundColor}"/>
  <g id="tile-layer">${tileRects}</g>
  <g id="package-layer">${packageGroups}</g>
  <g id="robot-layer">${robotGroups}</g>
  ${hud}
</svg>`;
}
