import { timingSafeEqual } from 'crypto';
import type { IncomingMessage } from 'http';
import type { NextFunction, Request, Response } from 'express';

function safeEquals(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}

function getApiKeyFromAuthorization(headers: IncomingMessage['headers']): string {
  const authRaw = headers.authorization;
  const auth = Array.isArray(authRaw) ? String(authRaw[0] || '') : String(authRaw || '');
  const [scheme, token] = auth.split(' ');
  if (scheme?.toLowerCase() === 'bearer' && token) {
    return token.trim();
  }
  return '';
}

function decodeBase64UrlToken(value: string): string {
  try {
    return Buffer.from(value, 'base64url').toString('utf8').trim();
  } catch {
    return '';
  }
}

function getApiKeyFromWebSocketProtocol(headers: IncomingMessage['headers']): string {
  const raw = headers['sec-websocket-protocol'];
  const protocolHeader = Array.isArray(raw) ? String(raw[0] || '') : String(raw || '');
  if (!protocolHeader) {
    return '';
  }

  const protocols = protocolHeader.split(',').map((p) => p.trim()).filter(Boolean);
  const bearerProtocol = protocols.find((p) => p.startsWith('bearer.'));
  if (!bearerProtocol) {
    return '';
  }

  return decodeBase64UrlToken(bearerProtocol.slice('bearer.'.length));
}

function extractApiKey(req: IncomingMessage): string {
  return getApiKeyFromAuthorization(req.headers) || getApiKeyFromWebSocketProtocol(req.headers);
}

/** Resolves bearer tokens to the account they were issued to. */
export class ApiKeyDirectory {
  constructor(private readonly keys: Map<string, string>) {}

  resolveAccount(apiKey: string): string | null {
    if (!apiKey) {
      return null;
    }
    let match: string | null = null;
    for (const [token, account] of this.keys) {
      if (safeEquals(apiKey, token)) {
        match = account;
      }
    }
    return match;
  }

  resolveRequest(req: IncomingMessage): string | null {
    return this.resolveAccount(extractApiKey(req));
  }
}

/** Populates `res.locals.account` or answers 401. */
export function apiKeyMiddleware(directory: ApiKeyDirectory) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const account = directory.resolveRequest(req);
    if (!account) {
      res.status(401).json({
        ok: false,
        error: 'unauthorized',
        message: 'Provide a valid bearer token in the Authorization header.',
      });
      return;
    }
    res.locals.account = account;
    next();
  };
}

export function validateWebSocketApiKey(directory: ApiKeyDirectory, req: IncomingMessage): { ok: boolean; account?: string; reason?: string } {
  const account = directory.resolveRequest(req);
  if (!account) {
    return { ok: false, reason: 'invalid_api_key' };
  }
  return { ok: true, account };
}
