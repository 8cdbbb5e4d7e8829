import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { User } from '../domain/user';
import { unauthenticated } from '../errors';

const ALGORITHM = 'HS256';

export interface AccessToken {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
}

export interface TokenServiceOptions {
  secret: string;
  lifetimeMinutes: number;
  /** Defaults to the wall clock; tests pin it. */
  clock?: () => Date;
}

const payloadSchema = z.object({
  sub: z.string().regex(/^[1-9]\d*$/),
  iat: z.number().int(),
  exp: z.number().int(),
});

export class TokenService {
  private readonly secret: string;
  private readonly lifetimeSeconds: number;
  private readonly clock: () => Date;

  constructor(options: TokenServiceOptions) {
    this.secret = options.secret;
    this.lifetimeSeconds = options.lifetimeMinutes * 60;
    this.clock = options.clock ?? (() => new Date());
  }

  private nowSeconds(): number {
    return Math.floor(this.clock().getTime() / 1000);
  }

  issue(user: Pick<User, 'id'>): AccessToken {
    const iat = this.nowSeconds();
    const token = jwt.sign(
      { sub: String(user.id), iat, exp: iat + this.lifetimeSeconds },
      this.secret,
      { algorithm: ALGORITHM },
    );

    return {
      access_token: token,
      token_type: 'bearer',
      expires_in: this.lifetimeSeconds,
    };
  }

  /** Returns the user id carried by `raw`. Any bad signature, shape or an expired `exp` is Unauthenticated. */
  validate(raw: string): number {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(raw, this.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: this.nowSeconds(),
      });
    } catch {
      throw unauthenticated();
    }

    const payload = payloadSchema.safeParse(decoded);
    if (!payload.success) throw unauthenticated();

    return Number(payload.data.sub);
  }
}
