/**
 * Unit tests for SecureLinkService: issuance, single-use redemption,
 * expiry, rate limiting and the retention sweep.
 */
import { DomainError, DomainErrorKind } from '../common/errors/domain.error';
import { InMemoryModel } from '../testing/in-memory-model';
import { freezeTime, makeConfigService, setTime } from '../testing/test-config';
import { SecureLinkAttributes, SecureLinkType } from './model/secure-link.model';
import { SecureLinkService } from './secure-link.service';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = '2026-03-02T10:00:00.000Z';

const expectKind = async (promise: Promise<unknown>, kind: DomainErrorKind) => {
  await expect(promise).rejects.toBeInstanceOf(DomainError);
  await expect(promise).rejects.toMatchObject({ kind });
};

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('SecureLinkService', () => {
  let links: InMemoryModel<SecureLinkAttributes>;
  let service: SecureLinkService;

  beforeEach(() => {
    freezeTime(NOW);
    links = new InMemoryModel<SecureLinkAttributes>();
    service = new SecureLinkService(links as any, makeConfigService() as any);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  // ─── issue ────────────────────────────────────────────────────────────────

  describe('issue', () => {
    it('creates a valid 64-character hex link expiring after the login ttl', async () => {
      const link = await service.issue({ email: '  Supplier@Example.com ', type: SecureLinkType.AUTH });

      expect(link.identifier).toMatch(/^[0-9a-f]{64}$/);
      expect(link.email).toBe('supplier@example.com');
      expect(link.isValid).toBe(true);
      expect(link.usedAt).toBeNull();
      expect(link.expiresAt).toEqual(new Date('2026-03-02T10:15:00.000Z'));
    });

    it('uses the invitation ttl for invitation links', async () => {
      const link = await service.issue({
        email: 'supplier@example.com',
        type: SecureLinkType.INVITATION,
        relationshipId: 'rel-1',
      });

      expect(link.expiresAt).toEqual(new Date('2026-03-09T10:00:00.000Z'));
      expect(link.relationshipId).toBe('rel-1');
    });

    it('invalidates the previous login link for the same email', async () => {
      const first = await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });
      const second = await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });

      const stored = links.all();
      expect(stored.find((l) => l.id === first.id)?.isValid).toBe(false);
      expect(stored.find((l) => l.id === second.id)?.isValid).toBe(true);
    });

    it('leaves invitation links alone when a login link is issued', async () => {
      const invitation = await service.issue({ email: 'a@example.com', type: SecureLinkType.INVITATION });
      await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });

      expect(links.all().find((l) => l.id === invitation.id)?.isValid).toBe(true);
    });

    it('still issues when invalidating old links fails', async () => {
      jest.spyOn(links, 'update').mockRejectedValueOnce(new Error('db down'));

      const link = await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });

      expect(link.isValid).toBe(true);
      expect(links.rows).toHaveLength(1);
    });
  });

  // ─── redeem ───────────────────────────────────────────────────────────────

  describe('redeem', () => {
    it('succeeds once and marks the link used and invalid', async () => {
      const link = await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });

      const consumed = await service.redeem(link.identifier, SecureLinkType.AUTH);

      expect(consumed.usedAt).toEqual(new Date(NOW));
      expect(consumed.isValid).toBe(false);
    });

    it('fails AlreadyUsed on every later attempt', async () => {
      const link = await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });
      await service.redeem(link.identifier, SecureLinkType.AUTH);

      await expectKind(service.redeem(link.identifier, SecureLinkType.AUTH), DomainErrorKind.ALREADY_USED);
      await expectKind(service.redeem(link.identifier, SecureLinkType.AUTH), DomainErrorKind.ALREADY_USED);
    });

    it('lets exactly one of several concurrent redemptions succeed', async () => {
      const link = await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });

      const results = await Promise.allSettled([
        service.redeem(link.identifier, SecureLinkType.AUTH),
        service.redeem(link.identifier, SecureLinkType.AUTH),
        service.redeem(link.identifier, SecureLinkType.AUTH),
      ]);

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(2);
      rejected.forEach((r) => expect(r.reason).toMatchObject({ kind: DomainErrorKind.ALREADY_USED }));
    });

    it('fails NotFound for an unknown identifier', async () => {
      await expectKind(service.redeem('f'.repeat(64), SecureLinkType.AUTH), DomainErrorKind.NOT_FOUND);
    });

    it('fails NotFound when the link type does not match', async () => {
      const link = await service.issue({ email: 'a@example.com', type: SecureLinkType.INVITATION });

      await expectKind(service.redeem(link.identifier, SecureLinkType.AUTH), DomainErrorKind.NOT_FOUND);
    });

    it('fails Expired past expiry regardless of validity or use', async () => {
      const fresh = await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });
      const used = links.seed({
        identifier: 'a'.repeat(64),
        type: SecureLinkType.AUTH,
        email: 'b@example.com',
        isValid: false,
        usedAt: new Date('2026-03-02T10:01:00.000Z'),
        expiresAt: new Date('2026-03-02T10:15:00.000Z'),
      });

      setTime('2026-03-02T10:16:00.000Z');

      await expectKind(service.redeem(fresh.identifier, SecureLinkType.AUTH), DomainErrorKind.EXPIRED);
      await expectKind(service.redeem(used.identifier, SecureLinkType.AUTH), DomainErrorKind.EXPIRED);
    });

    it('fails Invalid for a superseded link that was never used', async () => {
      const first = await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });
      await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });

      await expectKind(service.redeem(first.identifier, SecureLinkType.AUTH), DomainErrorKind.INVALID);
    });
  });

  // ─── rate limit ───────────────────────────────────────────────────────────

  describe('enforceRateLimit', () => {
    it('rejects the fourth request inside the window and allows it after', async () => {
      for (let i = 0; i < 3; i += 1) {
        await service.enforceRateLimit('a@example.com');
        await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });
      }

      await expectKind(service.enforceRateLimit('A@example.com'), DomainErrorKind.RATE_LIMIT_EXCEEDED);

      setTime('2026-03-02T11:00:01.000Z');
      await expect(service.enforceRateLimit('a@example.com')).resolves.toBeUndefined();
    });

    it('counts invitation links toward the limit', async () => {
      await service.issue({ email: 'a@example.com', type: SecureLinkType.INVITATION, relationshipId: 'rel-1' });
      await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });
      await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });

      await expect(service.countRecent('a@example.com', 60)).resolves.toBe(3);
      await expectKind(service.enforceRateLimit('a@example.com'), DomainErrorKind.RATE_LIMIT_EXCEEDED);
    });

    it('counts per email', async () => {
      for (let i = 0; i < 3; i += 1) {
        await service.issue({ email: 'a@example.com', type: SecureLinkType.AUTH });
      }

      await expect(service.enforceRateLimit('b@example.com')).resolves.toBeUndefined();
    });
  });

  // ─── deleteExpired ────────────────────────────────────────────────────────

  describe('deleteExpired', () => {
    it('removes expired links whether used or not and keeps live ones', async () => {
      links.seed({ identifier: '1'.repeat(64), type: SecureLinkType.AUTH, email: 'a@example.com', isValid: true, usedAt: null, expiresAt: new Date('2026-03-02T09:00:00.000Z') });
      links.seed({ identifier: '2'.repeat(64), type: SecureLinkType.AUTH, email: 'b@example.com', isValid: false, usedAt: new Date('2026-03-02T08:30:00.000Z'), expiresAt: new Date('2026-03-02T09:30:00.000Z') });
      const live = await service.issue({ email: 'c@example.com', type: SecureLinkType.AUTH });

      const removed = await service.deleteExpired();

      expect(removed).toBe(2);
      expect(links.all().map((l) => l.id)).toEqual([live.id]);
    });
  });
});
