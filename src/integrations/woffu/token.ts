import { z } from 'zod'
import type { UserId } from '../../types/index.js'

export type ClaimDecodeResult =
  | { ok: true, userId: UserId }
  | { ok: false, reason: string }

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]+={0,2}$/

const userIdClaimSchema = z.object({
  UserId: z.union([
    z.number().int().positive(),
    z.string().regex(/^\d+$/).transform(Number).pipe(z.number().int().positive()),
  ]),
})

/**
 * Reads the `UserId` claim from a JWT payload without verifying the signature.
 * Never throws and never touches the network.
 */
export function decodeUserIdClaim(token: string): ClaimDecodeResult {
  const parts = token.split('.')
  if (parts.length !== 3) {
    return { ok: false, reason: `expected 3 token segments, got ${parts.length}` }
  }

  const payload = parts[1]
  if (!BASE64URL_SEGMENT.test(payload)) {
    return { ok: false, reason: 'payload segment is not base64url' }
  }

  let claims: unknown
  try {
    claims = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'))
  }
  catch {
    return { ok: false, reason: 'payload segment is not JSON' }
  }

  const parsed = userIdClaimSchema.safeParse(claims)
  if (!parsed.success) {
    return { ok: false, reason: 'token has no usable UserId claim' }
  }
  return { ok: true, userId: parsed.data.UserId }
}
