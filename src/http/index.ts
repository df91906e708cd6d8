export { createHttpChannel, requestFromHttp } from './channel.js';
export {
  createAccessLogMiddleware,
  createAuthMiddleware,
  getAuthResult,
  sendDavResponse,
  type AuthMiddlewareOptions,
} from './middleware.js';
