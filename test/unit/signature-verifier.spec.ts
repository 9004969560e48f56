import { createHmac } from 'crypto';
import {
  DEFAULT_SIGNATURE_HEADER,
  ManualClock,
  SignatureVerificationError,
  SignatureVerifier,
  SignedWebhookFactory,
  TEST_WEBHOOK_SECRET,
  VerificationFailure,
  generateSignatureHeader,
  verifySignature,
} from '../../src';

describe('Signature verification', () => {
  const NOW = 1700000000;
  const now = new Date(NOW * 1000);
  const secrets = [TEST_WEBHOOK_SECRET];

  const verify = (
    webhook: { body: Buffer; headers: Record<string, string> },
    options: { secrets?: string[]; tolerance?: number } = {},
  ) =>
    verifySignature(
      webhook.body,
      webhook.headers[DEFAULT_SIGNATURE_HEADER],
      options.secrets ?? secrets,
      options.tolerance ?? 300,
      now,
    );

  describe('verifySignature', () => {
    it('should produce a verified event for a correctly signed delivery', () => {
      const webhook = SignedWebhookFactory.signed({
        eventId: 'evt_1001',
        eventType: 'invoice.paid',
        timestamp: NOW,
        created: NOW - 10,
      });

      const result = verify(webhook);

      expect(result.verified).toBe(true);
      if (!result.verified) return;
      expect(result.event.id).toBe('evt_1001');
      expect(result.event.type).toBe('invoice.paid');
      expect(result.event.signedAt).toEqual(new Date(NOW * 1000));
      expect(result.event.createdAt).toEqual(new Date((NOW - 10) * 1000));
      expect(result.event.body.id).toBe('evt_1001');
    });

    it('should read created_at when created is absent', () => {
      const body = Buffer.from(
        JSON.stringify({ id: 'evt_1', type: 'a.b', created_at: '2023-11-14T22:00:00.000Z' }),
      );
      const webhook = SignedWebhookFactory.fromBody(body, { timestamp: NOW });

      const result = verify(webhook);

      expect(result.verified && result.event.createdAt.toISOString()).toBe(
        '2023-11-14T22:00:00.000Z',
      );
    });

    it('should fall back to the signed time for createdAt', () => {
      const body = Buffer.from(JSON.stringify({ id: 'evt_1', type: 'a.b' }));
      const webhook = SignedWebhookFactory.fromBody(body, { timestamp: NOW - 5 });

      const result = verify(webhook);

      expect(result.verified && result.event.createdAt).toEqual(new Date((NOW - 5) * 1000));
    });

    it('should reject a body altered after signing', () => {
      const result = verify(SignedWebhookFactory.tamperedBody({ timestamp: NOW }));

      expect(result.verified).toBe(false);
      expect(!result.verified && result.error.reason).toBe(
        VerificationFailure.SIGNATURE_MISMATCH,
      );
    });

    it('should reject a mutation of any single byte of the body', () => {
      const body = Buffer.from('{"id":"evt_1","type":"payment.succeeded"}');
      const header = generateSignatureHeader(body, TEST_WEBHOOK_SECRET, NOW);

      const reasons = new Set<string>();
      for (let i = 0; i < body.length; i++) {
        const mutated = Buffer.from(body);
        mutated[i] = mutated[i] ^ 0x01;

        const result = verifySignature(mutated, header, secrets, 300, now);
        reasons.add(result.verified ? 'verified' : result.error.reason);
      }

      expect([...reasons]).toEqual([VerificationFailure.SIGNATURE_MISMATCH]);
    });

    it('should sign the timestamp text exactly as it appears in the header', () => {
      const body = Buffer.from('{"id":"evt_1","type":"payment.succeeded"}');
      const digest = createHmac('sha256', TEST_WEBHOOK_SECRET)
        .update(`0${NOW}.${body.toString()}`)
        .digest('hex');

      const result = verifySignature(body, `t=0${NOW},v1=${digest}`, secrets, 300, now);

      expect(result.verified).toBe(true);
      expect(result.verified && result.event.signedAt).toEqual(now);
    });

    it('should reject a delivery signed with an unknown secret', () => {
      const result = verify(SignedWebhookFactory.wrongSecret({ timestamp: NOW }));

      expect(!result.verified && result.error.reason).toBe(
        VerificationFailure.SIGNATURE_MISMATCH,
      );
    });

    it('should reject a digest computed for a different timestamp', () => {
      const webhook = SignedWebhookFactory.signed({ timestamp: NOW });
      const forged = generateSignatureHeader(webhook.body, TEST_WEBHOOK_SECRET, NOW - 1);
      const header = `t=${NOW},${forged.split(',')[1]}`;

      const result = verifySignature(webhook.body, header, secrets, 300, now);

      expect(!result.verified && result.error.reason).toBe(
        VerificationFailure.SIGNATURE_MISMATCH,
      );
    });

    it('should accept a digest matching any configured secret', () => {
      const webhook = SignedWebhookFactory.signed({
        timestamp: NOW,
        secrets: 'whsec_previous',
      });

      const result = verify(webhook, { secrets: ['whsec_current', 'whsec_previous'] });

      expect(result.verified).toBe(true);
    });

    it('should accept when any one of several received digests matches', () => {
      const webhook = SignedWebhookFactory.signed({
        timestamp: NOW,
        secrets: ['whsec_unrelated', TEST_WEBHOOK_SECRET],
      });

      expect(verify(webhook).verified).toBe(true);
    });

    it('should accept a timestamp exactly at the tolerance boundary', () => {
      expect(verify(SignedWebhookFactory.stale(300, { now: NOW })).verified).toBe(true);
    });

    it('should reject a timestamp one second past the tolerance', () => {
      const result = verify(SignedWebhookFactory.stale(301, { now: NOW }));

      expect(!result.verified && result.error.reason).toBe(
        VerificationFailure.STALE_TIMESTAMP,
      );
    });

    it('should reject a timestamp too far in the future', () => {
      const result = verify(SignedWebhookFactory.signed({ timestamp: NOW + 301 }));

      expect(!result.verified && result.error.reason).toBe(
        VerificationFailure.STALE_TIMESTAMP,
      );
    });

    it('should report a stale timestamp even when the digest is wrong', () => {
      const result = verify(
        SignedWebhookFactory.stale(3600, { now: NOW, secrets: 'whsec_unknown' }),
      );

      expect(!result.verified && result.error.reason).toBe(
        VerificationFailure.STALE_TIMESTAMP,
      );
    });

    it('should honour a custom tolerance', () => {
      const webhook = SignedWebhookFactory.stale(61, { now: NOW });

      expect(verify(webhook, { tolerance: 60 }).verified).toBe(false);
      expect(verify(webhook, { tolerance: 61 }).verified).toBe(true);
    });

    it.each(['', 't=abc,v1=00', 'v1=00', `t=${NOW}`])(
      'should reject malformed header %p',
      (headerValue) => {
        const result = verify(
          SignedWebhookFactory.malformedSignature(headerValue, { timestamp: NOW }),
        );

        expect(!result.verified && result.error.reason).toBe(
          VerificationFailure.MALFORMED_SIGNATURE,
        );
      },
    );

    it('should reject a delivery without the signature header', () => {
      const webhook = SignedWebhookFactory.signed({ timestamp: NOW });

      const result = verifySignature(webhook.body, undefined, secrets, 300, now);

      expect(result.verified).toBe(false);
      if (result.verified) return;
      expect(result.error).toBeInstanceOf(SignatureVerificationError);
      expect(result.error.reason).toBe(VerificationFailure.MALFORMED_SIGNATURE);
    });

    it.each([
      ['invalid JSON', '{ invalid json }'],
      ['a JSON array', '[1,2,3]'],
      ['a missing id', '{"type":"invoice.paid"}'],
      ['an empty type', '{"id":"evt_1","type":""}'],
      ['a numeric id', '{"id":42,"type":"invoice.paid"}'],
    ])('should reject a correctly signed body with %s', (_label, body) => {
      const result = verify(SignedWebhookFactory.malformedPayload(body, { timestamp: NOW }));

      expect(!result.verified && result.error.reason).toBe(
        VerificationFailure.MALFORMED_PAYLOAD,
      );
    });
  });

  describe('SignatureVerifier', () => {
    it('should require at least one non-empty secret', () => {
      expect(() => new SignatureVerifier({ secrets: [] })).toThrow(
        'At least one webhook signing secret is required',
      );
      expect(() => new SignatureVerifier({ secrets: [''] })).toThrow();
    });

    it('should verify against the injected clock', () => {
      const clock = new ManualClock(new Date(NOW * 1000));
      const verifier = new SignatureVerifier({
        secrets: [TEST_WEBHOOK_SECRET],
        toleranceSeconds: 60,
        clock,
      });
      const webhook = SignedWebhookFactory.signed({ timestamp: NOW });
      const header = webhook.headers[DEFAULT_SIGNATURE_HEADER];

      expect(verifier.verify(webhook.body, header).verified).toBe(true);

      clock.advanceSeconds(61);
      const result = verifier.verify(webhook.body, header);
      expect(!result.verified && result.error.reason).toBe(
        VerificationFailure.STALE_TIMESTAMP,
      );
    });

    it('should expose secret count and tolerance', () => {
      const verifier = new SignatureVerifier({ secrets: ['whsec_a', 'whsec_b', ''] });

      expect(verifier.secretCount).toBe(2);
      expect(verifier.tolerance).toBe(300);
    });
  });
});
