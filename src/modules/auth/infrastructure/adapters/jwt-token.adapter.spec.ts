import { ConfigService } from '@nestjs/config';

import * as jwt from 'jsonwebtoken';

import { JwtTokenAdapter, isTokenType } from './jwt-token.adapter';

const SECRET = 'test-secret-value-1234';

function configWith(values: Record<string, unknown>): ConfigService {
  return new ConfigService(values);
}

describe('JwtTokenAdapter', () => {
  let adapter: JwtTokenAdapter;

  beforeEach(() => {
    adapter = new JwtTokenAdapter(
      configWith({ JWT_SECRET: SECRET, JWT_REFRESH_TTL_SECONDS: 7200 }),
    );
  });

  it('signs tokens that it verifies back', () => {
    const issued = adapter.sign('user:user-1', 'access');

    expect(issued.expiresIn).toBe(3600);
    expect(adapter.verify(issued.token)).toEqual({
      sub: 'user:user-1',
      jti: issued.jti,
      typ: 'access',
    });
  });

  it('uses the configured refresh ttl', () => {
    const issued = adapter.sign('user:user-1', 'refresh');

    expect(issued.expiresIn).toBe(7200);
    const decoded = jwt.decode(issued.token);
    expect(decoded).toMatchObject({
      iss: 'bookvault-api',
      aud: 'bookvault',
      typ: 'refresh',
    });
  });

  it('gives every token its own jti', () => {
    const first = adapter.sign('user:user-1', 'access');
    const second = adapter.sign('user:user-1', 'access');

    expect(first.jti).not.toBe(second.jti);
  });

  it('rejects a token signed with another secret', () => {
    const token = jwt.sign({ typ: 'access' }, 'another-secret-value', {
      subject: 'user:user-1',
      jwtid: 'jti-1',
      issuer: 'bookvault-api',
      audience: 'bookvault',
    });

    expect(adapter.verify(token)).toBeNull();
  });

  it('rejects a token for another audience', () => {
    const token = jwt.sign({ typ: 'access' }, SECRET, {
      subject: 'user:user-1',
      jwtid: 'jti-1',
      issuer: 'bookvault-api',
      audience: 'someone-else',
    });

    expect(adapter.verify(token)).toBeNull();
  });

  it('rejects an expired token', () => {
    const token = jwt.sign(
      { typ: 'access', exp: Math.floor(Date.now() / 1000) - 60 },
      SECRET,
      { subject: 'user:user-1', jwtid: 'jti-1', issuer: 'bookvault-api', audience: 'bookvault' },
    );

    expect(adapter.verify(token)).toBeNull();
  });

  it('rejects a token without a known type', () => {
    const token = jwt.sign({ typ: 'id' }, SECRET, {
      subject: 'user:user-1',
      jwtid: 'jti-1',
      issuer: 'bookvault-api',
      audience: 'bookvault',
    });

    expect(adapter.verify(token)).toBeNull();
  });

  it('rejects garbage', () => {
    expect(adapter.verify('not.a.jwt')).toBeNull();
  });

  it('fails to start without JWT_SECRET', () => {
    expect(() => new JwtTokenAdapter(configWith({}))).toThrow();
  });

  describe('isTokenType', () => {
    it('accepts only access and refresh', () => {
      expect(isTokenType('access')).toBe(true);
      expect(isTokenType('refresh')).toBe(true);
      expect(isTokenType('id')).toBe(false);
      expect(isTokenType(undefined)).toBe(false);
    });
  });
});
