import { describe, it, expect } from "vitest";
import { createGrid, isFree, sameCell } from "../grid/grid.js";
import { parseMap } from "../grid/loadMap.js";
import { PackageStatus } from "../domain/package.js";
import { createRandomSource } from "../sim/rng.js";
import {
  generateScenario,
  validateScenario,
  type ScenarioInput,
} from "../sim/scenario.js";
import { ConfigurationError, InvalidPlacementError } from "../sim/errors.js";

const MAP = `
1 1 1 1 1 1 1 1 1 1
1 0 0 0 0 0 0 0 0 1
1 0 0 0 0 0 0 0 0 1
1 0 0 1 1 0 1 1 0 1
1 0 0 0 0 0 0 0 0 1
1 0 0 0 0 0 0 0 0 1
1 0 0 1 1 0 1 1 0 1
1 0 0 0 0 0 0 0 0 1
1 0 0 0 0 0 0 0 0 1
1 1 1 1 1 1 1 1 1 1
`;

describe("generateScenario", () => {
  const grid = parseMap(MAP);
  const generate = (seed: number) =>
    generateScenario({
      grid,
      robotCount: 5,
      packageCount: 20,
      horizon: 100,
      rng: createRandomSource(seed),
    });

  it("places robots on distinct free cells", () => {
    const { robots } = generate(1);
    expect(robots).toHaveLength(5);
    const keys = new Set(robots.map((r) => r.position.join(",")));
    expect(keys.size).toBe(5);
    for (const robot of robots) {
      expect(isFree(grid, robot.position)).toBe(true);
      expect(robot.carrying).toBeNull();
    }
  });

  it("numbers packages by ascending spawn time", () => {
    const { packages } = generate(1);
    expect(packages.map((p) => p.id)).toEqual(
      Array.from({ length: 20 }, (_, i) => i + 1),
    );
    for (let i = 1; i < packages.length; i++) {
      expect(packages[i].spawnTime).toBeGreaterThanOrEqual(
        packages[i - 1].spawnTime,
      );
    }
  });

  it("spawns one package per robot at tick 0 and the rest inside the horizon", () => {
    const { packages } = generate(3);
    expect(packages.filter((p) => p.spawnTime === 0)).toHaveLength(5);
    for (const pkg of packages.slice(5)) {
      expect(pkg.spawnTime).toBeGreaterThanOrEqual(1);
      expect(pkg.spawnTime).toBeLessThan(100);
    }
  });

  it("draws valid endpoints and deadlines", () => {
    const { packages } = generate(4);
    for (const pkg of packages) {
      expect(isFree(grid, pkg.start)).toBe(true);
      expect(isFree(grid, pkg.target)).toBe(true);
      expect(sameCell(pkg.start, pkg.target)).toBe(false);
      // 10 rows: slack = 10 + randInt(5, 30)
      const slack = pkg.deadline - pkg.spawnTime;
      expect(slack).toBeGreaterThanOrEqual(15);
      expect(slack).toBeLessThanOrEqual(39);
      expect(pkg.status).toBe(PackageStatus.PENDING);
    }
  });

  it("is reproducible for a fixed seed", () => {
    expect(generate(42)).toEqual(generate(42));
  });

  it("rejects more robots than free cells", () => {
    const tiny = createGrid([[0, 1, 0]]);
    expect(() =>
      generateScenario({
        grid: tiny,
        robotCount: 3,
        packageCount: 0,
        horizon: 10,
        rng: createRandomSource(1),
      }),
    ).toThrow(ConfigurationError);
  });

  it("rejects packages on a single free cell", () => {
    expect(() =>
      generateScenario({
        grid: createGrid([[0, 1]]),
        robotCount: 1,
        packageCount: 1,
        horizon: 10,
        rng: createRandomSource(1),
      }),
    ).toThrow("At least two free cells are required to place packages");
  });

  it("rejects late packages when the horizon has no room for them", () => {
    expect(() =>
      generateScenario({
        grid: createGrid([[0, 0, 0]]),
        robotCount: 1,
        packageCount: 2,
        horizon: 1,
        rng: createRandomSource(1),
      }),
    ).toThrow("Horizon 1 leaves no tick for late-spawning packages");
  });

  it("allows zero robots and zero packages", () => {
    const scenario = generateScenario({
      grid: createGrid([[0]]),
      robotCount: 0,
      packageCount: 0,
      horizon: 1,
      rng: createRandomSource(1),
    });
    expect(scenario).toEqual({ robots: [], packages: [] });
  });
});

describe("validateScenario", () => {
  const grid = createGrid([
    [0, 0, 0],
    [0, 1, 0],
  ]);
  const pkg: ScenarioInput["packages"][number] = {
    id: 1,
    start: [0, 0],
    target: [0, 2],
    spawnTime: 0,
    deadline: 5,
  };

  it("converts a valid scenario into initial state", () => {
    const scenario = validateScenario(grid, {
      robots: [[1, 0]],
      packages: [pkg],
    });
    expect(scenario.robots).toEqual([{ position: [1, 0], carrying: null }]);
    expect(scenario.packages).toEqual([
      { ...pkg, status: PackageStatus.PENDING },
    ]);
  });

  it("rejects a robot on an obstacle", () => {
    expect(() =>
      validateScenario(grid, { robots: [[1, 1]], packages: [] }),
    ).toThrow(InvalidPlacementError);
    expect(() =>
      validateScenario(grid, { robots: [[1, 1]], packages: [] }),
    ).toThrow("Robot 0 placed on an obstacle at (1, 1)");
  });

  it("rejects a robot outside the grid", () => {
    expect(() =>
      validateScenario(grid, { robots: [[2, 0]], packages: [] }),
    ).toThrow("Robot 0 placed outside the grid at (2, 0)");
  });

  it("rejects a fractional robot cell", () => {
    expect(() =>
      validateScenario(grid, { robots: [[0.5, 0]], packages: [] }),
    ).toThrow("Robot 0 placed outside the grid at (0.5, 0)");
  });

  it("rejects a fractional package start", () => {
    expect(() =>
      validateScenario(grid, {
        robots: [],
        packages: [{ ...pkg, start: [0.5, 0] }],
      }),
    ).toThrow("Package 1: start is not a free cell");
  });

  it("rejects two robots on one cell", () => {
    expect(() =>
      validateScenario(grid, {
        robots: [
          [0, 0],
          [0, 0],
        ],
        packages: [],
      }),
    ).toThrow("Robot 1 placed on an occupied cell (0, 0)");
  });

  it("rejects a package whose target equals its start", () => {
    expect(() =>
      validateScenario(grid, {
        robots: [],
        packages: [{ ...pkg, target: [0, 0] }],
      }),
    ).toThrow("Package 1: target equals start");
  });

  it("rejects a deadline that is not after the spawn time", () => {
    expect(() =>
      validateScenario(grid, {
        robots: [],
        packages: [{ ...pkg, spawnTime: 3, deadline: 3 }],
      }),
    ).toThrow("Package 1: deadline must be after spawn time");
  });

  it("rejects ids out of spawn order", () => {
    expect(() =>
      validateScenario(grid, {
        robots: [],
        packages: [
          { ...pkg, spawnTime: 4, deadline: 9 },
          { ...pkg, id: 2, spawnTime: 1, deadline: 9 },
        ],
      }),
    ).toThrow("Package 2: ids must follow ascending spawn time");
  });

  it("rejects a start on an obstacle", () => {
    expect(() =>
      validateScenario(grid, {
        robots: [],
        packages: [{ ...pkg, start: [1, 1] }],
      }),
    ).toThrow(ConfigurationError);
  });
});
