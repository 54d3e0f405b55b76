/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { process, convertFile } from "./processor";
export { stats, formatDuration } from "./stats";
