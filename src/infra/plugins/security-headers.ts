/**
 * Security Headers Plugin
 *
 * Configures HTTP security headers using @fastify/helmet.
 * The server only returns JSON, so the CSP forbids every resource type.
 */

import helmet from '@fastify/helmet';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

const API_CSP_DIRECTIVES = {
  defaultSrc: ["'none'"],
  frameAncestors: ["'none'"],
  formAction: ["'none'"],
};

/** 1 year max-age with subdomains included */
const HSTS_CONFIG = {
  maxAge: 31536000,
  includeSubDomains: true,
  preload: false,
};

/**
 * Registers HTTP security headers plugin.
 */
export async function registerSecurityHeaders(
  fastify: FastifyInstance,
  config: AppConfig
): Promise<void> {
  const { isProduction, isTest } = config.server;

  if (isTest) {
    fastify.log.debug('Security headers disabled in test environment');
    return;
  }

  await fastify.register(helmet, {
    contentSecurityPolicy: { directives: API_CSP_DIRECTIVES },
    dnsPrefetchControl: { allow: false },
    frameguard: { action: 'deny' },
    hsts: isProduction ? HSTS_CONFIG : false,
    permittedCrossDomainPolicies: { permittedPolicies: 'none' },
    referrerPolicy: { policy: 'no-referrer' },
    // Deprecated header; CSP covers it
    xssFilter: false,
    hidePoweredBy: true,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    // The API is called from the front-end origin
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  fastify.log.info({ production: isProduction }, 'Security headers plugin registered');
}
