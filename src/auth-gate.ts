/**
 * Bearer-token check for every `/v1/*` route.
 *
 * Tokens are compared through their SHA-256 digests with
 * `crypto.timingSafeEqual`, so the comparison takes the same time wherever
 * two tokens differ and whatever their lengths.
 *
 * @packageDocumentation
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { UnauthorizedError, err, ok, type Result } from './errors.js';

/** An authenticated caller. Carries no copy of the token. */
export interface Principal {
  /** First 12 hex chars of the token's SHA-256, for log correlation. */
  fingerprint: string;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export class AuthGate {
  private readonly secrets: readonly Buffer[];

  constructor(tokens: readonly string[]) {
    this.secrets = tokens.map(digest);
  }

  authenticate(header: string | undefined): Result<Principal> {
    if (header === undefined || header.length === 0) {
      return err(new UnauthorizedError('Missing Authorization header'));
    }

    const match = /^Bearer ([^\s]+)$/i.exec(header.trim());
    const token = match?.[1];
    if (token === undefined) {
      return err(new UnauthorizedError('Invalid Authorization header format. Expected: Bearer <token>'));
    }

    const candidate = digest(token);
    // No early exit: every secret is compared.
    let matched = false;
    for (const secret of this.secrets) {
      if (timingSafeEqual(candidate, secret)) matched = true;
    }
    if (!matched) {
      return err(new UnauthorizedError('Invalid token'));
    }

    return ok({ fingerprint: candidate.toString('hex').slice(0, 12) });
  }
}
