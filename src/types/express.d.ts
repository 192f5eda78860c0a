/**
 * Type augmentation for Express Request.
 * Adds the member identity attached by requireMember after the token is
 * verified.
 */

import type { SubjectKey } from "../services/achievements";

declare global {
  namespace Express {
    interface Request {
      /** Populated by requireMember. */
      member?: SubjectKey;
      /** Populated by requestLogger. */
      requestId?: string;
    }
  }
}
