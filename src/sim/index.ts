export {
  DeliveryEnvironment,
  type EnvironmentOptions,
  type EpisodeInfo,
  type StepEvent,
  type StepResult,
} from "./environment.js";
export {
  generateScenario,
  validateScenario,
  type Scenario,
  type ScenarioInput,
  type ScenarioParams,
} from "./scenario.js";
export { resolveMovement, proposeTarget, type MovementResult } from "./movement.js";
export {
  applyPackageAction,
  revealPackages,
  tryDrop,
  tryPickup,
  type Delivery,
  type PackageEvent,
  type RewardConfig,
} from "./packages.js";
export {
  buildSnapshot,
  type PackageView,
  type RobotView,
  type Snapshot,
} from "./snapshot.js";
export { createRandomSource, type RandomSource } from "./rng.js";
export {
  ConfigurationError,
  InvalidInvocationError,
  InvalidPlacementError,
} from "./errors.js";
export {
  createGrid,
  freeCells,
  isFree,
  type Cell,
  type Grid,
} from "../grid/grid.js";
export { parseMap, loadMapFile } from "../grid/loadMap.js";
export {
  Move,
  PackageAction,
  parseAction,
  type RobotAction,
} from "../domain/actions.js";
export { PackageStatus, type PackageState } from "../domain/package.js";
export type { RobotState } from "../domain/robot.js";
