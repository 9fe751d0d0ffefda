import { SignJWT, errors, jwtVerify } from 'jose';

export interface TokenIssuerConfig {
  secret: string;
  ttlHours: number;
  now?: () => Date;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export type TokenVerification =
  | { status: 'valid'; accountId: string; issuedAt: Date; expiresAt: Date }
  | { status: 'invalid' }
  | { status: 'expired' };

/**
 * Stateless HS256 session tokens for account holders. Tokens cannot be
 * revoked before they expire; rotating the secret invalidates all of them.
 */
export class TokenIssuer {
  private readonly secret: Uint8Array;

  private readonly now: () => Date;

  public constructor(private readonly config: TokenIssuerConfig) {
    this.secret = new TextEncoder().encode(config.secret);
    this.now = config.now ?? (() => new Date());
  }

  public async issue(accountId: string): Promise<IssuedToken> {
    const issuedAt = Math.floor(this.now().getTime() / 1_000);
    const expiresAt = issuedAt + this.config.ttlHours * 3_600;

    const token = await new SignJWT({})
      .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
      .setSubject(accountId)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(this.secret);

    return {
      token,
      expiresAt: new Date(expiresAt * 1_000)
    };
  }

  public async verify(token: string): Promise<TokenVerification> {
    try {
      const { payload } = await jwtVerify(token, this.secret, {
        algorithms: ['HS256'],
        currentDate: this.now()
      });

      if (
        typeof payload.sub !== 'string'
        || payload.sub.length === 0
        || typeof payload.iat !== 'number'
        || typeof payload.exp !== 'number'
      ) {
        return { status: 'invalid' };
      }

      return {
        status: 'valid',
        accountId: payload.sub,
        issuedAt: new Date(payload.iat * 1_000),
        expiresAt: new Date(payload.exp * 1_000)
      };
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        return { status: 'expired' };
      }

      if (error instanceof errors.JOSEError) {
        return { status: 'invalid' };
      }

      throw error;
    }
  }
}
