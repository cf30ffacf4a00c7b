export { specsCommand } from "./specs.js";
export { simulateCommand } from "./simulate.js";
