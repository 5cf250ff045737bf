/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for all auth endpoints.
 * - Every service call runs under the per-request deadline.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 * - Tokens travel in the JSON body (Bearer scheme), never in cookies.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import { AppError } from '../../shared/http/errors';
import { clientInfo } from '../../shared/http/client-info';
import { runWithDeadline } from '../../shared/http/deadline';
import { requireIdentity } from '../../shared/http/require-auth-context';
import type { AuthService } from './auth.service';
import {
  changePasswordSchema,
  forgotPasswordSchema,
  loginSchema,
  refreshSchema,
  resetPasswordSchema,
  sendOtpSchema,
  verifyOtpSchema,
  verifyTwoFactorSchema,
} from './auth.schemas';

const FORGOT_PASSWORD_RESPONSE = {
  message: 'If an account with that email exists, a password reset link has been sent.',
} as const;

const RESET_PASSWORD_RESPONSE = {
  message: 'Password updated successfully. Please sign in with your new password.',
} as const;

const OTP_SENT_RESPONSE = {
  message: 'If an account with that email exists, a code has been sent.',
} as const;

function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw AppError.validationError('Invalid request body', {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly requestTimeoutMs: number,
  ) {}

  async login(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(loginSchema, req.body);
    const client = clientInfo(req);

    const result = await runWithDeadline(this.requestTimeoutMs, (signal) =>
      this.authService.login({ email: body.email, password: body.password, client }, signal),
    );

    return reply.status(200).send(result);
  }

  async verifyTwoFactor(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(verifyTwoFactorSchema, req.body);
    const client = clientInfo(req);

    const result = await runWithDeadline(this.requestTimeoutMs, (signal) =>
      this.authService.verifyTwoFactor({ email: body.email, code: body.code, client }, signal),
    );

    return reply.status(200).send(result);
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(refreshSchema, req.body);
    const client = clientInfo(req);

    const result = await runWithDeadline(this.requestTimeoutMs, (signal) =>
      this.authService.refresh({ refreshToken: body.refreshToken, client }, signal),
    );

    return reply.status(200).send(result);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireIdentity(req);
    const client = clientInfo(req);

    await runWithDeadline(this.requestTimeoutMs, (signal) =>
      this.authService.logout({ identity, client }, signal),
    );

    return reply.status(204).send();
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireIdentity(req);

    return reply.status(200).send({
      id: identity.id,
      email: identity.email,
      roles: identity.roles,
      permissions: identity.permissions,
      sessionId: identity.sessionId,
    });
  }

  async listSessions(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireIdentity(req);

    const sessions = await runWithDeadline(this.requestTimeoutMs, () =>
      this.authService.listSessions(identity),
    );

    return reply.status(200).send({ sessions });
  }

  async changePassword(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireIdentity(req);
    const body = parseBody(changePasswordSchema, req.body);
    const client = clientInfo(req);

    const result = await runWithDeadline(this.requestTimeoutMs, (signal) =>
      this.authService.changePassword(
        {
          identity,
          currentPassword: body.currentPassword,
          newPassword: body.newPassword,
          client,
        },
        signal,
      ),
    );

    return reply.status(200).send(result);
  }

  async forgotPassword(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(forgotPasswordSchema, req.body);
    const client = clientInfo(req);

    await runWithDeadline(this.requestTimeoutMs, () =>
      this.authService.requestPasswordReset({ email: body.email, client }),
    );

    return reply.status(200).send(FORGOT_PASSWORD_RESPONSE);
  }

  async resetPassword(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(resetPasswordSchema, req.body);
    const client = clientInfo(req);

    await runWithDeadline(this.requestTimeoutMs, (signal) =>
      this.authService.resetPassword(
        { token: body.token, newPassword: body.newPassword, client },
        signal,
      ),
    );

    return reply.status(200).send(RESET_PASSWORD_RESPONSE);
  }

  async sendOtp(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(sendOtpSchema, req.body);
    const client = clientInfo(req);

    await runWithDeadline(this.requestTimeoutMs, () =>
      this.authService.sendOtp({ email: body.email, purpose: body.purpose, client }),
    );

    return reply.status(202).send(OTP_SENT_RESPONSE);
  }

  async verifyOtp(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(verifyOtpSchema, req.body);
    const client = clientInfo(req);

    await runWithDeadline(this.requestTimeoutMs, () =>
      this.authService.verifyOtp({
        email: body.email,
        purpose: body.purpose,
        code: body.code,
        client,
      }),
    );

    return reply.status(200).send({ verified: true });
  }
}
