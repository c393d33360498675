export { UltimateModule } from "./rules";
export { UltimateUI } from "./ui";
export { computeMeta, nextForcedBoard } from "./state";
