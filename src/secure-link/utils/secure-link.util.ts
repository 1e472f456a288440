import { randomBytes } from 'crypto';
import { SecureLinkAttributes } from '../model/secure-link.model';

export const IDENTIFIER_BYTES = 32;

/** 32 random bytes, hex-encoded: 64 characters. */
export const generateIdentifier = (): string => randomBytes(IDENTIFIER_BYTES).toString('hex');

type LinkState = Pick<SecureLinkAttributes, 'isValid' | 'usedAt' | 'expiresAt'>;

export const isLinkExpired = (link: LinkState, now: Date = new Date()): boolean =>
  now.getTime() >= new Date(link.expiresAt).getTime();

export const canBeUsed = (link: LinkState, now: Date = new Date()): boolean =>
  link.isValid && link.usedAt === null && !isLinkExpired(link, now);
