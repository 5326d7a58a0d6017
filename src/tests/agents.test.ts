import { describe, it, expect } from "vitest";
import { createGrid } from "../grid/grid.js";
import { Move, PackageAction } from "../domain/actions.js";
import { DeliveryEnvironment } from "../sim/environment.js";
import { createAgent, GreedyAgent, RandomAgent } from "../agents/index.js";
import { bfsDistances, stepToward } from "../agents/pathUtils.js";
import { runEpisode } from "../app/runEpisode.js";
import type { Snapshot } from "../sim/snapshot.js";

describe("pathUtils", () => {
  const grid = createGrid([
    [0, 0, 0],
    [1, 1, 0],
    [0, 0, 0],
  ]);

  it("measures distances around obstacles", () => {
    const dist = bfsDistances(grid, [0, 0]);
    expect(dist.get("2,0")).toBe(6);
    expect(dist.get("1,0")).toBeUndefined();
  });

  it("steps along a shortest path", () => {
    expect(stepToward(grid, [0, 0], [2, 0])).toBe(Move.RIGHT);
    expect(stepToward(grid, [0, 2], [2, 0])).toBe(Move.DOWN);
    expect(stepToward(grid, [2, 2], [2, 0])).toBe(Move.LEFT);
  });

  it("stays when already there or the goal is unreachable", () => {
    expect(stepToward(grid, [0, 0], [0, 0])).toBe(Move.STAY);
    const walled = createGrid([[0, 1, 0]]);
    expect(stepToward(walled, [0, 0], [0, 2])).toBe(Move.STAY);
  });
});

describe("GreedyAgent", () => {
  it("fetches and delivers a single package along the shortest route", () => {
    const env = new DeliveryEnvironment({
      grid: createGrid([[0, 0, 0, 0, 0]]),
      robotCount: 1,
      packageCount: 1,
      horizon: 20,
    });
    const { summary, recording } = runEpisode(env, new GreedyAgent(), {
      scenario: {
        robots: [[0, 0]],
        packages: [
          { id: 1, start: [0, 2], target: [0, 4], spawnTime: 0, deadline: 20 },
        ],
      },
    });

    expect(summary.totalTimeSteps).toBe(4);
    expect(summary.totalReward).toBeCloseTo(9.96);
    expect(summary.delivered).toBe(1);
    expect(summary.onTime).toBe(1);
    expect(summary.late).toBe(0);
    expect(recording.frames.map((f) => f.positions[0])).toEqual([
      [0, 0],
      [0, 1],
      [0, 2],
      [0, 3],
      [0, 4],
    ]);
    expect(recording.frames.map((f) => f.carrying[0])).toEqual([
      null,
      null,
      1,
      1,
      null,
    ]);
    expect(recording.packages[0].pickupTick).toBe(1);
    expect(recording.packages[0].deliveryTick).toBe(3);
  });

  it("sends each idle robot to a different package", () => {
    const agent = new GreedyAgent();
    const snapshot: Snapshot = {
      timeStep: 0,
      map: [[0, 0, 0, 0, 0]],
      robots: [
        [1, 1, 0],
        [1, 5, 0],
      ],
      packages: [
        [1, 1, 2, 1, 3, 0, 10],
        [2, 1, 4, 1, 3, 0, 10],
      ],
    };
    agent.init(snapshot);
    expect(agent.getActions(snapshot)).toEqual([
      [Move.RIGHT, PackageAction.PICKUP],
      [Move.LEFT, PackageAction.PICKUP],
    ]);
  });

  it("stays idle with nothing to do", () => {
    const agent = new GreedyAgent();
    const snapshot: Snapshot = {
      timeStep: 0,
      map: [[0, 0]],
      robots: [[1, 1, 0]],
      packages: [],
    };
    agent.init(snapshot);
    expect(agent.getActions(snapshot)).toEqual([
      [Move.STAY, PackageAction.NONE],
    ]);
  });

  it("refuses to act before init", () => {
    const snapshot: Snapshot = {
      timeStep: 0,
      map: [[0]],
      robots: [],
      packages: [],
    };
    expect(() => new GreedyAgent().getActions(snapshot)).toThrow(
      "GreedyAgent.getActions() called before init()",
    );
  });
});

describe("RandomAgent", () => {
  const snapshot: Snapshot = {
    timeStep: 0,
    map: [[0, 0, 0]],
    robots: [
      [1, 1, 0],
      [1, 3, 0],
    ],
    packages: [],
  };

  it("returns one valid action per robot", () => {
    const agent = new RandomAgent(5);
    agent.init(snapshot);
    for (let i = 0; i < 20; i++) {
      const actions = agent.getActions(snapshot);
      expect(actions).toHaveLength(2);
      for (const [move, pkgAction] of actions) {
        expect(Object.values(Move)).toContain(move);
        expect(Object.values(PackageAction)).toContain(pkgAction);
      }
    }
  });

  it("is reproducible for a fixed seed", () => {
    const a = new RandomAgent(9);
    const b = new RandomAgent(9);
    a.init(snapshot);
    b.init(snapshot);
    expect(a.getActions(snapshot)).toEqual(b.getActions(snapshot));
  });
});

describe("createAgent", () => {
  it("builds agents by kind", () => {
    expect(createAgent("greedy", 1).name).toBe("greedy");
    expect(createAgent("random", 1).name).toBe("random");
  });
});
