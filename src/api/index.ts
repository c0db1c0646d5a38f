/**
 * BNPL Credit Protocol - API Module Export
 */

export { createApp, AppOptions } from './app';
export { actorAuthMiddleware, adminAuthMiddleware, getActor } from './middleware/auth.middleware';
export { handleRouteError } from './http-errors';
