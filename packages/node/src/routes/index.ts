/**
 * Route barrel - re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createOwnerRoutes } from "./owners.js";
export { createTreasuryRoutes } from "./deposits.js";
export { createTransactionRoutes } from "./transactions.js";
export { createSubscriptionRoutes } from "./subscriptions.js";
export { createEventRoutes } from "./events.js";
export { createTokenRoutes } from "./tokens.js";
export type { TokenRouteOptions } from "./tokens.js";
