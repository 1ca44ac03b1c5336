import crypto from 'crypto';

export const generateSessionToken = () => crypto.randomBytes(48).toString('hex');

export const generateCsrfToken = () => crypto.randomBytes(16).toString('hex');

export const tokensMatch = (expected: string, candidate: string) => {
  const a = Buffer.from(expected);
  const b = Buffer.from(candidate);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
};
