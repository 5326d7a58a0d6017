#!/usr/bin/env node
import "dotenv/config";
import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { loadConfig } from "./config/loadConfig.js";
import { PRESETS } from "./config/presets.js";
import { loadMapFile } from "./grid/loadMap.js";
import { DeliveryEnvironment } from "./sim/environment.js";
import { createAgent } from "./agents/index.js";
import { runEpisode } from "./app/runEpisode.js";
import { renderEpisodeSvg } from "./render/renderEpisodeSvg.js";
import { formatTickReport } from "./render/textReport.js";

function main(): void {
  const config = loadConfig();

  console.time("load map");
  const grid = loadMapFile(config.mapFile);
  console.timeEnd("load map");

  const env = new DeliveryEnvironment({
    grid,
    robotCount: config.robots,
    packageCount: config.packages,
    horizon: config.maxTimeSteps,
    seed: config.seed,
    rewards: {
      moveCost: config.moveCost,
      deliveryReward: config.deliveryReward,
      delayReward: config.delayReward,
    },
  });
  const agent = createAgent(config.agent, config.seed);

  console.time("episode");
  const { summary, recording } = runEpisode(env, agent, {
    onStep: () => {
      if (!config.verbose) return;
      console.log(
        formatTickReport({
          tick: env.tick,
          totalReward: env.totalReward,
          robots: env.robots,
          packages: env.packages,
        }),
      );
      console.log("-".repeat(50));
    },
  });
  console.timeEnd("episode");

  console.log("Episode:", {
    map: config.mapFile,
    agent: agent.name,
    robots: config.robots,
    ...summary,
    totalReward: Number(summary.totalReward.toFixed(2)),
  });

  mkdirSync(config.outDir, { recursive: true });
  const outPath = join(
    config.outDir,
    `simulation_${agent.name}_${config.robots}robots_${config.packages}packages.svg`,
  );
  console.time("renderEpisodeSvg");
  const svg = renderEpisodeSvg(recording, PRESETS[config.renderPreset]);
  console.timeEnd("renderEpisodeSvg");
  writeFileSync(outPath, svg, "utf-8");
  console.log("Written:", outPath);
}

try {
  main();
} catch (err) {
  if (err instanceof Error) {
    console.error(`${err.name}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
}
