import { SignJWT, jwtVerify } from 'jose';
import { type Actor } from '@careline/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  /** Lifetime of a dependent device session, in seconds. */
  dependentSessionTtl: number;
  caregiverTokenTtl?: number;
  issuer?: string;
}

export type TokenScope = 'caregiver' | 'dependent';

export interface TokenService {
  signCaregiverToken(caregiverId: string): Promise<string>;
  signDependentSession(pairingId: string): Promise<string>;
  /** Resolves the bearer to an actor; throws on a bad signature, issuer, expiry or scope. */
  verify(token: string): Promise<Exclude<Actor, { kind: 'system' }>>;
}

function isTokenScope(value: unknown): value is TokenScope {
  return value === 'caregiver' || value === 'dependent';
}

export class JoseTokenService implements TokenService {
  private readonly keys: Map<string, JwtKey>;
  private readonly activeKey: JwtKey;
  private readonly dependentSessionTtl: number;
  private readonly caregiverTokenTtl: number;
  private readonly issuer: string;

  constructor(config: TokenServiceConfig) {
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    this.activeKey = active;
    this.dependentSessionTtl = config.dependentSessionTtl;
    this.caregiverTokenTtl = config.caregiverTokenTtl ?? 900;
    this.issuer = config.issuer ?? 'careline';
  }

  async signCaregiverToken(caregiverId: string): Promise<string> {
    return this.sign(caregiverId, 'caregiver', this.caregiverTokenTtl);
  }

  async signDependentSession(pairingId: string): Promise<string> {
    return this.sign(pairingId, 'dependent', this.dependentSessionTtl);
  }

  async verify(token: string): Promise<Exclude<Actor, { kind: 'system' }>> {
    const { payload } = await jwtVerify(
      token,
      async (header) => {
        const key = header.kid ? this.keys.get(header.kid) : undefined;
        if (!key) throw new Error('No valid JWT key found');
        return key.secret;
      },
      {
        issuer: this.issuer,
        algorithms: ['HS256'],
      },
    );

    if (!payload.sub) {
      throw new Error('JWT missing sub claim');
    }
    const scope = payload['scope'];
    if (!isTokenScope(scope)) {
      throw new Error('JWT missing scope claim');
    }

    return scope === 'caregiver'
      ? { kind: 'caregiver', caregiverId: payload.sub }
      : { kind: 'dependent', pairingId: payload.sub };
  }

  private async sign(subject: string, scope: TokenScope, ttlSeconds: number): Promise<string> {
    return new SignJWT({ sub: subject, scope })
      .setProtectedHeader({ alg: 'HS256', kid: this.activeKey.kid })
      .setIssuedAt()
      .setIssuer(this.issuer)
      .setExpirationTime(`${ttlSeconds}s`)
      .sign(this.activeKey.secret);
  }
}
