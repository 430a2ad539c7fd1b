/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createRoundRoutes } from "./rounds.js";
export { createSubmissionRoutes } from "./submissions.js";
export { createFundsRoutes } from "./funds.js";
export { createRewardRoutes } from "./rewards.js";
export { createOracleRoutes } from "./oracles.js";
export { createEventRoutes } from "./events.js";
