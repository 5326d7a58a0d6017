import type { DeliveryEnvironment, StepResult } from "../sim/environment.js";
import type { ScenarioInput } from "../sim/scenario.js";
import type { AgentPolicy } from "../agents/types.js";
import type {
  EpisodeFrame,
  EpisodeRecording,
  PackageTimeline,
} from "../render/types.js";

export type EpisodeSummary = {
  totalReward: number;
  totalTimeSteps: number;
  packages: number;
  delivered: number;
  onTime: number;
  late: number;
};

export type RunOptions = {
  /** 주어지면 reset() 대신 이 고정 시나리오로 시작 */
  scenario?: ScenarioInput;
  onStep?: (result: StepResult) => void;
};

export type EpisodeRun = {
  summary: EpisodeSummary;
  recording: EpisodeRecording;
};

function captureFrame(env: DeliveryEnvironment): EpisodeFrame {
  const robots = env.robots;
  return {
    tick: env.tick,
    positions: robots.map((r) => r.position),
    carrying: robots.map((r) => r.carrying),
    totalReward: env.totalReward,
  };
}

/**
 * reset → (정책 → step) 반복 → 종료까지 한 에피소드를 돌린다.
 * 환경은 horizon에서 반드시 끝나므로 루프는 유한하다.
 */
export function runEpisode(
  env: DeliveryEnvironment,
  agent: AgentPolicy,
  options: RunOptions = {},
): EpisodeRun {
  const { scenario, onStep } = options;
  let snapshot = scenario ? env.load(scenario) : env.reset();
  agent.init(snapshot);

  const frames: EpisodeFrame[] = [captureFrame(env)];
  const pickupTick = new Map<number, number>();
  const deliveryTick = new Map<number, number>();
  let onTime = 0;
  let late = 0;

  let done = false;
  while (!done) {
    const actions = agent.getActions(snapshot);
    const result = env.step(actions);
    // 이벤트는 step 시작 시점의 tick에 일어난 것
    const tick = result.snapshot.timeStep - 1;
    for (const event of result.events) {
      if (event.kind === "pickup") pickupTick.set(event.packageId, tick);
      if (event.kind === "delivery") {
        deliveryTick.set(event.packageId, tick);
        if (event.onTime) onTime++;
        else late++;
      }
    }
    frames.push(captureFrame(env));
    onStep?.(result);
    snapshot = result.snapshot;
    done = result.done;
  }

  const packages: PackageTimeline[] = env.packages.map((p) => ({
    id: p.id,
    start: p.start,
    target: p.target,
    spawnTime: p.spawnTime,
    deadline: p.deadline,
    pickupTick: pickupTick.get(p.id) ?? null,
    deliveryTick: deliveryTick.get(p.id) ?? null,
  }));

  return {
    summary: {
      totalReward: env.totalReward,
      totalTimeSteps: env.tick,
      packages: packages.length,
      delivered: onTime + late,
      onTime,
      late,
    },
    recording: { grid: env.grid, frames, packages },
  };
}
