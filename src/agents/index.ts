import type { AgentPolicy } from "./types.js";
import { GreedyAgent } from "./greedyAgent.js";
import { RandomAgent } from "./randomAgent.js";

export const AGENT_KINDS = ["greedy", "random"] as const;

export type AgentKind = (typeof AGENT_KINDS)[number];

export function createAgent(kind: AgentKind, seed: number): AgentPolicy {
  switch (kind) {
    case "greedy":
      return new GreedyAgent();
    case "random":
      return new RandomAgent(seed);
  }
}

export type { AgentPolicy } from "./types.js";
export { GreedyAgent } from "./greedyAgent.js";
export { RandomAgent } from "./randomAgent.js";
