import type { RevocationReason } from '../types/token.js';

/**
 * Security events worth keeping apart from the request log.
 * Family ids may appear here; they never leave the server otherwise.
 */
export type AuditEvent =
  | { type: 'refresh_token_reuse_detected'; userId: string; familyId: string; revokedCount: number }
  | { type: 'sessions_revoked'; userId: string; reason: RevocationReason; revokedCount: number }
  | { type: 'api_key_regenerated'; userId: string; projectId: string }
  | { type: 'login_failed'; email: string };

export interface AuditLogger {
  record(event: AuditEvent): void;
}

/**
 * Writes one JSON line per event to stderr
 */
export const consoleAuditLogger: AuditLogger = {
  record(event) {
    console.warn(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        audit: true,
        ...event,
      })
    );
  },
};
