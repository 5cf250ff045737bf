/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Authenticated routes declare their gate as a preHandler.
 */

import type { FastifyInstance } from 'fastify';
import { requireAuthenticated } from '../../shared/http/require-auth-context';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/auth/login', controller.login.bind(controller));
  app.post('/auth/2fa/verify', controller.verifyTwoFactor.bind(controller));
  app.post('/auth/refresh', controller.refresh.bind(controller));

  app.post('/auth/logout', { preHandler: requireAuthenticated }, controller.logout.bind(controller));
  app.get('/auth/me', { preHandler: requireAuthenticated }, controller.me.bind(controller));
  app.get(
    '/auth/sessions',
    { preHandler: requireAuthenticated },
    controller.listSessions.bind(controller),
  );

  app.post(
    '/auth/password/change',
    { preHandler: requireAuthenticated },
    controller.changePassword.bind(controller),
  );
  app.post('/auth/forgot-password', controller.forgotPassword.bind(controller));
  app.post('/auth/reset-password', controller.resetPassword.bind(controller));

  app.post('/auth/otp/send', controller.sendOtp.bind(controller));
  app.post('/auth/otp/verify', controller.verifyOtp.bind(controller));
}
