import { createHmac } from 'crypto';
import {
  computeSignature,
  generateSignatureHeader,
  parseSignatureHeader,
  secureCompare,
} from '../../src';

describe('Signature header', () => {
  const body = Buffer.from('{"id":"evt_1","type":"invoice.paid"}');

  describe('parseSignatureHeader', () => {
    it('should parse timestamp and digests', () => {
      expect(parseSignatureHeader('t=1700000000,v1=ABCDEF,v1=012345')).toEqual({
        timestamp: 1700000000,
        rawTimestamp: '1700000000',
        signatures: [
          { scheme: 'v1', digest: 'abcdef' },
          { scheme: 'v1', digest: '012345' },
        ],
      });
    });

    it('should keep digests of other schemes', () => {
      expect(parseSignatureHeader('t=5,v0=aa,v1=bb')).toEqual({
        timestamp: 5,
        rawTimestamp: '5',
        signatures: [
          { scheme: 'v0', digest: 'aa' },
          { scheme: 'v1', digest: 'bb' },
        ],
      });
    });

    it('should tolerate whitespace around fields', () => {
      expect(parseSignatureHeader(' t=5 , v1=bb ')).toEqual({
        timestamp: 5,
        rawTimestamp: '5',
        signatures: [{ scheme: 'v1', digest: 'bb' }],
      });
    });

    it('should keep the timestamp text as received', () => {
      const parsed = parseSignatureHeader('t=01700000000,v1=bb');

      expect(parsed?.timestamp).toBe(1700000000);
      expect(parsed?.rawTimestamp).toBe('01700000000');
    });

    it.each([
      ['missing header', undefined],
      ['empty header', ''],
      ['no timestamp', 'v1=abc'],
      ['no v1 digest', 't=1700000000'],
      ['only other schemes', 't=1700000000,v0=abc'],
      ['non-numeric timestamp', 't=17000a,v1=abc'],
      ['negative timestamp', 't=-5,v1=abc'],
      ['repeated timestamp', 't=1,t=2,v1=abc'],
      ['empty digest', 't=1700000000,v1='],
      ['empty key', 't=1700000000,=abc'],
      ['field without separator', 't=1700000000,v1abc'],
    ])('should return null for %s', (_label, value) => {
      expect(parseSignatureHeader(value)).toBeNull();
    });
  });

  describe('computeSignature', () => {
    it('should be HMAC-SHA256 over "{t}." followed by the raw body', () => {
      const expected = createHmac('sha256', 'whsec_test_secret')
        .update(`1700000000.${body.toString()}`)
        .digest('hex');

      expect(computeSignature(body, 'whsec_test_secret', 1700000000)).toBe(expected);
    });

    it('should depend on the timestamp', () => {
      expect(computeSignature(body, 'whsec_test_secret', 1700000000)).not.toBe(
        computeSignature(body, 'whsec_test_secret', 1700000001),
      );
    });

    it('should accept Buffer secrets', () => {
      expect(computeSignature(body, Buffer.from('whsec_test_secret'), 1)).toBe(
        computeSignature(body, 'whsec_test_secret', 1),
      );
    });
  });

  describe('generateSignatureHeader', () => {
    it('should emit one v1 digest per secret', () => {
      const header = generateSignatureHeader(body, ['whsec_a', 'whsec_b'], 1700000000);

      expect(header).toBe(
        [
          't=1700000000',
          `v1=${computeSignature(body, 'whsec_a', 1700000000)}`,
          `v1=${computeSignature(body, 'whsec_b', 1700000000)}`,
        ].join(','),
      );
    });

    it('should round-trip through the parser', () => {
      const parsed = parseSignatureHeader(generateSignatureHeader(body, 'whsec_a', 42));

      expect(parsed?.timestamp).toBe(42);
      expect(parsed?.signatures).toEqual([
        { scheme: 'v1', digest: computeSignature(body, 'whsec_a', 42) },
      ]);
    });
  });

  describe('secureCompare', () => {
    it('should compare equal strings as equal', () => {
      expect(secureCompare('abc123', 'abc123')).toBe(true);
    });

    it('should reject strings of the same length that differ', () => {
      expect(secureCompare('abc123', 'abc124')).toBe(false);
    });

    it('should reject strings of different length', () => {
      expect(secureCompare('abc123', 'abc1234')).toBe(false);
    });
  });
});
