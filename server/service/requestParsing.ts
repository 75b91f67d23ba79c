import { type MarginErrorCode, fail } from '../margin/errors';
import { ROLES, type Direction, type Role } from '../margin/types';
import { U64_MAX } from '../margin/U64Math';

const DIGITS = /^\d+$/;

const ROLE_ALIASES: Record<string, Role> = {
  admin: 'ADMIN',
  lp: 'LIQUIDITY_PROVIDER',
  liquidity_provider: 'LIQUIDITY_PROVIDER',
  oracle: 'ORACLE_OPERATOR',
  oracle_operator: 'ORACLE_OPERATOR',
};

/** Accepts a non-negative safe integer or a decimal digit string within u64. */
export function parseU64(value: unknown, field: string, code: MarginErrorCode = 'InvalidRequest'): bigint {
  let parsed: bigint | null = null;
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    parsed = BigInt(value);
  } else if (typeof value === 'string' && DIGITS.test(value.trim())) {
    parsed = BigInt(value.trim());
  }

  if (parsed === null || parsed > U64_MAX) {
    fail(code, `invalid_${field}`, { field, value: value === undefined ? null : String(value) });
  }
  return parsed;
}

/** `LONG`/`SHORT` in any case, or the wire codes 1 (long) and 2 (short). */
export function parseDirection(value: unknown): Direction {
  const normalized = String(value ?? '').trim().toUpperCase();
  if (normalized === 'LONG' || normalized === '1') {
    return 'LONG';
  }
  if (normalized === 'SHORT' || normalized === '2') {
    return 'SHORT';
  }
  return fail('InvalidDirection', `invalid_direction:${normalized}`);
}

export function parseLeverage(value: unknown): number {
  const n = typeof value === 'string' && DIGITS.test(value.trim()) ? Number(value.trim()) : value;
  if (typeof n !== 'number' || !Number.isInteger(n)) {
    fail('InvalidLeverage', 'invalid_leverage', { value: String(value) });
  }
  return n;
}

export function parseBoolean(value: unknown, field: string): boolean {
  if (value === true || value === 'true') {
    return true;
  }
  if (value === false || value === 'false') {
    return false;
  }
  return fail('InvalidRequest', `invalid_${field}`, { field });
}

export function parseRole(value: unknown): Role {
  const raw = String(value ?? '').trim();
  const upper = raw.toUpperCase();
  const role = ROLES.find((r) => r === upper) ?? ROLE_ALIASES[raw.toLowerCase()];
  if (!role) {
    fail('InvalidRequest', `invalid_role:${raw}`);
  }
  return role;
}

export function requireString(value: unknown, field: string): string {
  const text = typeof value === 'string' ? value.trim() : '';
  if (!text) {
    fail('InvalidRequest', `${field}_required`, { field });
  }
  return text;
}
