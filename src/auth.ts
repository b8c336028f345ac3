import { timingSafeEqual } from 'node:crypto'
import { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify'

function sameToken(given: string, expected: string) {
  const a = Buffer.from(given)
  const b = Buffer.from(expected)
  return a.length === b.length && timingSafeEqual(a, b)
}

export function bearerToken(req: FastifyRequest): string | null {
  const auth = req.headers['authorization']
  return auth && auth.startsWith('Bearer ') ? auth.slice(7) : null
}

// No token configured means open access, as on a local dev box.
export function requireAdmin(adminToken: string | null): preHandlerAsyncHookHandler {
  return async (req: FastifyRequest, reply: FastifyReply) => {
    if (!adminToken) return
    const token = bearerToken(req)
    if (!token || !sameToken(token, adminToken)) {
      return reply.code(401).send({ error: 'Unauthorized' })
    }
  }
}
