import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as jwt from 'jsonwebtoken';
import { UserRole } from '../../types/roles';
import { TokenService } from './token.service';

describe('TokenService', () => {
  const config = new ConfigService({
    jwt: { secret: 'test-secret', accessTokenLifetimeMinutes: 15, refreshTokenLifetimeDays: 7 },
  });
  const service = new TokenService(config);
  const subject = { id: 7, role: UserRole.DOCTOR, clinicId: 3 };

  it('should issue an access token with the user claims', () => {
    const claims = service.verify(service.issue(subject, 'access'), 'access');

    expect(claims.sub).toBe('7');
    expect(claims.role).toBe(UserRole.DOCTOR);
    expect(claims.clinicId).toBe(3);
    expect(claims.type).toBe('access');
    expect(claims.exp - claims.iat).toBe(15 * 60);
    expect(service.userIdOf(claims)).toBe(7);
  });

  it('should give refresh tokens a seven day lifetime', () => {
    const { refresh } = service.issuePair(subject);
    const claims = service.verify(refresh, 'refresh');

    expect(claims.exp - claims.iat).toBe(7 * 24 * 60 * 60);
  });

  it('should give every token its own jti', () => {
    const pair = service.issuePair(subject);

    expect(service.verify(pair.access, 'access').jti).not.toBe(service.verify(pair.refresh, 'refresh').jti);
  });

  it('should reject a token of the wrong type', () => {
    const refresh = service.issue(subject, 'refresh');

    expect(() => service.verify(refresh, 'access')).toThrow('Token has wrong type. Expected access token.');
  });

  it('should reject a token signed with another secret', () => {
    const forged = jwt.sign({ sub: '7', type: 'access' }, 'other-secret');

    expect(() => service.verify(forged, 'access')).toThrow('Token is invalid.');
  });

  it('should reject an expired token', () => {
    const expired = jwt.sign(
      { sub: '7', role: UserRole.DOCTOR, clinicId: 3, type: 'access', jti: 'j', exp: Math.floor(Date.now() / 1000) - 60 },
      'test-secret',
    );

    expect(() => service.verify(expired, 'access')).toThrow(UnauthorizedException);
    expect(() => service.verify(expired, 'access')).toThrow('Token is expired.');
  });

  it('should fail without a configured secret', () => {
    expect(() => new TokenService(new ConfigService({}))).toThrow();
  });
});
