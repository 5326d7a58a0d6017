import seedrandom from "seedrandom";

/** 시나리오 생성·랜덤 에이전트가 공유하는 결정적 난수원 */
export type RandomSource = {
  /** [low, high) 범위의 정수 */
  randInt(low: number, high: number): number;
};

export function createRandomSource(seed: number | string): RandomSource {
  const prng = seedrandom(String(seed));
  return {
    randInt(low, high) {
      const lo = Math.trunc(low);
      const hi = Math.trunc(high);
      if (hi <= lo) {
        throw new RangeError(`randInt: empty range [${low}, ${high})`);
      }
      return lo + Math.floor(prng() * (hi - lo));
    },
  };
}
