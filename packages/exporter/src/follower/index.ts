export { LineFollower, waitForFile } from "./line-follower.js";
export type { LineFollowerOptions } from "./line-follower.js";
