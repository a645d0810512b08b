import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env';

// Tokens are minted by the identity provider; we only verify them.
const payloadSchema = z.object({
  id: z.string().min(1),
  username: z.string().optional(),
});

export type AuthTokenPayload = z.infer<typeof payloadSchema>;

export function verifyToken(token: string, secret: string = env.jwtSecret): AuthTokenPayload | null {
  try {
    const decoded = jwt.verify(token, secret);
    const parsed = payloadSchema.safeParse(decoded);
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function bearerToken(header: string | undefined): string | undefined {
  return typeof header === 'string' && header.startsWith('Bearer ') ? header.slice(7) : undefined;
}
