export { SimulatedDevice } from "./device.js";
export type { DeviceEvents, TargetSquare } from "./device.js";
export { TapTargetTask } from "./tapTarget.js";
export { randomAction } from "./policy.js";
export { createRandom, randomInt } from "./random.js";
