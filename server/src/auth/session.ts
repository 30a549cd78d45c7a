import crypto from 'crypto'
import jwt, { type JwtPayload } from 'jsonwebtoken'
import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { InvalidCredential, Unauthorized } from '../errors'

export type SessionGrant = {
  token: string
  expiresAt: string
}

export type SessionGateOptions = {
  password: string
  secret: string
  ttlSeconds: number
}

const ADMIN_SUBJECT = 'admin'

function sameSecret(a: string, b: string): boolean {
  const left = crypto.createHash('sha256').update(a).digest()
  const right = crypto.createHash('sha256').update(b).digest()
  return crypto.timingSafeEqual(left, right)
}

/** Password check in front of uploads and deletes. Grants are signed JWTs. */
export class SessionGate {
  constructor(private readonly options: SessionGateOptions) {}

  authenticate(credential: unknown): SessionGrant {
    const password = typeof credential === 'string' ? credential.trim() : ''
    if (!password || !sameSecret(password, this.options.password)) {
      throw new InvalidCredential()
    }
    const token = jwt.sign({ role: ADMIN_SUBJECT }, this.options.secret, {
      subject: ADMIN_SUBJECT,
      expiresIn: this.options.ttlSeconds
    })
    const expiresAt = new Date(Date.now() + this.options.ttlSeconds * 1000).toISOString()
    return { token, expiresAt }
  }

  verifyGrant(token: string | undefined): JwtPayload {
    if (!token) throw new Unauthorized()
    let decoded: string | JwtPayload
    try {
      decoded = jwt.verify(token, this.options.secret)
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) throw new Unauthorized('Admin session expired')
      throw new Unauthorized('Invalid admin session')
    }
    if (typeof decoded === 'string' || decoded.sub !== ADMIN_SUBJECT) {
      throw new Unauthorized('Invalid admin session')
    }
    return decoded
  }

  requireAdmin(): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction) => {
      const header = req.headers.authorization ?? ''
      const token = header.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : undefined
      try {
        this.verifyGrant(token)
        next()
      } catch (err) {
        next(err)
      }
    }
  }
}
