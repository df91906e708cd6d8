/**
 * Express glue for authentication and envelope delivery.
 *
 * The AuthResult of a request is kept in `res.locals.authResult` so a later
 * sendDavResponse() can echo the Digest Authentication-Info header.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import chalk from 'chalk';
import { AuthResult, type Authenticator } from '../auth/index.js';
import { getLogger } from '../logging/index.js';
import type { DavResponse, StreamingSender } from '../response/index.js';
import { requestFromHttp } from './channel.js';

const logger = getLogger('http');

export interface AuthMiddlewareOptions {
  authenticator: Authenticator;
  sender: StreamingSender;
}

export function getAuthResult(res: Response): AuthResult | undefined {
  const value: unknown = res.locals['authResult'];
  return value instanceof AuthResult ? value : undefined;
}

/**
 * Authenticates every request. Failures are answered with the 401 challenge
 * envelope and never reach the next handler.
 */
export function createAuthMiddleware(options: AuthMiddlewareOptions): RequestHandler {
  const { authenticator, sender } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    const request = requestFromHttp(req, res);
    const result = authenticator.authenticate(request);
    res.locals['authResult'] = result;

    if (result.ok) {
      logger.debug(`${result.scheme ?? '-'} authentication succeeded for ${result.user?.username ?? '-'}`);
      next();
      return;
    }

    logger.debug(`authentication failed for ${request.method} ${request.path}: ${result.failureReason}`);
    const challenge = authenticator.buildChallengeResponse(request, result.failureReason);
    sender.send(request, challenge).catch(next);
  };
}

/**
 * Send an envelope on an express response, echoing Authentication-Info when the
 * request was Digest-authenticated.
 */
export function sendDavResponse(
  req: Request,
  res: Response,
  response: DavResponse,
  sender: StreamingSender
): Promise<void> {
  const request = requestFromHttp(req, res);
  request.authResult = getAuthResult(res);
  return sender.send(request, response);
}

function colorStatus(status: number): string {
  if (status < 200) return chalk.red(String(status));
  if (status < 400) return chalk.cyan(String(status));
  if (status < 500) return chalk.yellow(String(status));
  return chalk.red(String(status));
}

/**
 * One INFO line per finished request.
 */
export function createAccessLogMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = Date.now();
    res.on('finish', () => {
      const username = getAuthResult(res)?.user?.username ?? '-';
      logger.info(
        `${req.method} ${req.originalUrl} ${colorStatus(res.statusCode)} ${username} ${Date.now() - startedAt}ms`
      );
    });
    next();
  };
}
