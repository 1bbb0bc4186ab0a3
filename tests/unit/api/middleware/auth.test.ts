import jwt from 'jsonwebtoken';
import { parseDurationSeconds, signOperatorToken } from '../../../../src/api/middleware/auth';
import { ConfigurationError } from '../../../../src/utils/errors';

describe('parseDurationSeconds', () => {
  it.each([
    ['3600', 3600],
    ['90s', 90],
    ['15m', 900],
    ['12h', 43200],
    ['30d', 2592000],
  ])('should read %s as %d seconds', (value, seconds) => {
    expect(parseDurationSeconds(value)).toBe(seconds);
  });

  it.each(['', 'soon', '1w', '-5m'])('should reject %p', (value) => {
    expect(() => parseDurationSeconds(value)).toThrow(ConfigurationError);
  });
});

describe('signOperatorToken', () => {
  it('should carry the operator and expire after the given duration', () => {
    const token = signOperatorToken('1001', 'test-secret', '2h');

    const decoded = jwt.verify(token, 'test-secret');

    expect(typeof decoded).toBe('object');
    if (typeof decoded === 'object') {
      expect(decoded.operatorId).toBe('1001');
      expect((decoded.exp ?? 0) - (decoded.iat ?? 0)).toBe(7200);
    }
  });
});
