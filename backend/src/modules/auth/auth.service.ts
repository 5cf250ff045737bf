/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Single entry point for the sign-in and session use-cases. Each method
 *   delegates to a flow (deep module) that owns the ordering of its checks.
 *
 * RULES:
 * - No HTTP concerns (controller handles that).
 * - Flows that commit state take the request's AbortSignal and check it right
 *   before their first write.
 * - Never store/log raw passwords, codes or tokens.
 */

import type { ClientInfo } from '../../shared/http/client-info';
import type { CurrentIdentity } from '../../shared/http/require-auth-context';
import type { SessionView } from '../sessions/session.types';

import type { AuthDeps } from './auth.deps';
import type { AuthenticatedResult, LoginResult } from './auth.types';
import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import { logoutFlow } from './flows/logout/logout-flow';
import { sendOtpFlow, type SendOtpParams } from './flows/otp/send-otp-flow';
import { verifyOtpFlow, type VerifyOtpParams } from './flows/otp/verify-otp-flow';
import {
  changePasswordFlow,
  type ChangePasswordParams,
} from './flows/password/change-password-flow';
import {
  requestPasswordResetFlow,
  type RequestPasswordResetParams,
} from './flows/password-reset/request-password-reset-flow';
import {
  resetPasswordFlow,
  type ResetPasswordParams,
} from './flows/password-reset/reset-password-flow';
import { refreshFlow, type RefreshParams } from './flows/refresh/refresh-flow';
import {
  verifyTwoFactorFlow,
  type VerifyTwoFactorParams,
} from './flows/two-factor/verify-two-factor-flow';

export class AuthService {
  constructor(private readonly deps: AuthDeps) {}

  // ── Sign-in ──────────────────────────────────────────────

  login(params: LoginParams, signal: AbortSignal): Promise<LoginResult> {
    return executeLoginFlow(this.deps, params, signal);
  }

  verifyTwoFactor(params: VerifyTwoFactorParams, signal: AbortSignal): Promise<AuthenticatedResult> {
    return verifyTwoFactorFlow(this.deps, params, signal);
  }

  refresh(params: RefreshParams, signal: AbortSignal): Promise<AuthenticatedResult> {
    return refreshFlow(this.deps, params, signal);
  }

  logout(
    params: { identity: CurrentIdentity; client: ClientInfo },
    signal: AbortSignal,
  ): Promise<void> {
    return logoutFlow(this.deps, params, signal);
  }

  // ── Sessions ─────────────────────────────────────────────

  async listSessions(identity: CurrentIdentity): Promise<SessionView[]> {
    const sessions = await this.deps.sessionRegistry.listActive(identity.id);

    return sessions.map((s) => ({
      id: s.id,
      issuedAt: s.issuedAt.toISOString(),
      expiresAt: s.expiresAt.toISOString(),
      userAgent: s.userAgent,
      ip: s.ip,
      current: s.id === identity.sessionId,
    }));
  }

  // ── Passwords ────────────────────────────────────────────

  changePassword(params: ChangePasswordParams, signal: AbortSignal): Promise<{ revokedSessions: number }> {
    return changePasswordFlow(this.deps, params, signal);
  }

  /** Always resolves; the outcome is visible in the audit log only. */
  requestPasswordReset(params: RequestPasswordResetParams): Promise<void> {
    return requestPasswordResetFlow(this.deps, params);
  }

  resetPassword(params: ResetPasswordParams, signal: AbortSignal): Promise<void> {
    return resetPasswordFlow(this.deps, params, signal);
  }

  // ── One-time codes ───────────────────────────────────────

  sendOtp(params: SendOtpParams): Promise<void> {
    return sendOtpFlow(this.deps, params);
  }

  verifyOtp(params: VerifyOtpParams): Promise<void> {
    return verifyOtpFlow(this.deps, params);
  }
}
