/**
 * Public listen links: HMAC tokens tied to a voicemail id.
 * Tokens do not expire; rotating PUBLIC_ACCESS_SECRET revokes all of them.
 */

import { createHmac, timingSafeEqual } from "node:crypto";

const TOKEN_LENGTH = 32;

export function generateAccessToken(secret: string, voicemailId: number): string {
  return createHmac("sha256", secret)
    .update(`voicemail:${voicemailId}`)
    .digest("hex")
    .substring(0, TOKEN_LENGTH);
}

export function verifyAccessToken(secret: string, voicemailId: number, token: string): boolean {
  const expected = Buffer.from(generateAccessToken(secret, voicemailId));
  const given = Buffer.from(token);
  return given.length === expected.length && timingSafeEqual(given, expected);
}

export function publicListenUrl(baseUrl: string, secret: string, voicemailId: number): string {
  return `${baseUrl}/listen/${voicemailId}?token=${generateAccessToken(secret, voicemailId)}`;
}
