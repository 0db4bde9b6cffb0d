import { createHmac, timingSafeEqual } from 'node:crypto';

import { z } from 'zod';

export type TokenType = 'access' | 'refresh';

interface SignOptions {
  expiresInSeconds: number;
  subject: string;
  type: TokenType;
  issuedAt?: Date;
  additionalClaims?: Record<string, unknown>;
}

const jwtPayloadSchema = z
  .object({
    sub: z.string(),
    type: z.enum(['access', 'refresh']),
    exp: z.number(),
    iat: z.number(),
    role: z.string().optional(),
    name: z.string().optional(),
    email: z.string().optional(),
    adminRank: z.string().nullable().optional(),
    jti: z.string().optional()
  })
  .passthrough();

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;

const HEADER = { alg: 'HS256', typ: 'JWT' } as const;

function encodeSegment(value: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

function sign(secret: string, signingInput: string): Buffer {
  return createHmac('sha256', secret).update(signingInput).digest();
}

export function signJwt(secret: string, options: SignOptions): string {
  const issuedAt = Math.floor((options.issuedAt ?? new Date()).getTime() / 1000);
  const payload = {
    ...(options.additionalClaims ?? {}),
    sub: options.subject,
    type: options.type,
    iat: issuedAt,
    exp: issuedAt + options.expiresInSeconds
  };

  const signingInput = `${encodeSegment(HEADER)}.${encodeSegment(payload)}`;
  return `${signingInput}.${sign(secret, signingInput).toString('base64url')}`;
}

export function verifyJwt(token: string, secret: string, now: Date = new Date()): JwtPayload {
  const [header, payload, signature] = token.split('.');

  if (!header || !payload || !signature) {
    throw new Error('Invalid token format');
  }

  const expected = sign(secret, `${header}.${payload}`);
  const provided = Buffer.from(signature, 'base64url');
  if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
    throw new Error('Invalid token signature');
  }

  const decoded = jwtPayloadSchema.parse(JSON.parse(Buffer.from(payload, 'base64url').toString('utf-8')));

  if (decoded.exp <= Math.floor(now.getTime() / 1000)) {
    throw new Error('Token expired');
  }

  return decoded;
}
