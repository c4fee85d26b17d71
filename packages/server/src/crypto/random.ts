import { randomBytes, randomUUID } from 'node:crypto';
import { z } from 'zod';
import { REFRESH_TOKEN_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate the opaque refresh secret handed to the client
 */
export function generateRefreshToken(length: number = REFRESH_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a unique ID for database records
 */
export function generateId(): string {
  return randomUUID();
}

const uuidSchema = z.string().uuid();

/**
 * Record ids and API keys are UUIDs. Anything else can never match a stored
 * row, and PostgreSQL rejects it outright in a uuid column.
 */
export function isUuid(value: string): boolean {
  return uuidSchema.safeParse(value).success;
}

/**
 * Generate a token family ID for refresh token rotation tracking
 */
export function generateFamilyId(): string {
  return randomUUID();
}

/**
 * Generate a project API key
 */
export function generateApiKey(): string {
  return randomUUID();
}
