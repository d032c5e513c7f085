import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { DatabaseService } from '../../database/database.service';
import { TokenService } from '../services/token.service';
import { UserRole } from '../../types/roles';
import { extractBearerToken, JwtAuthGuard } from './jwt-auth.guard';

function contextFor(request: Partial<Request>): ExecutionContext {
  return {
    getHandler: () => undefined,
    getClass: () => undefined,
    switchToHttp: () => ({ getRequest: () => request }),
  } as unknown as ExecutionContext;
}

describe('extractBearerToken()', () => {
  it('should read a bearer token', () => {
    expect(extractBearerToken('Bearer abc.def')).toBe('abc.def');
  });

  it('should ignore other schemes', () => {
    expect(extractBearerToken('Basic abc')).toBeNull();
    expect(extractBearerToken(undefined)).toBeNull();
  });
});

describe('JwtAuthGuard', () => {
  const tokens = new TokenService(new ConfigService({ jwt: { secret: 'test-secret' } }));
  const reflector = { getAllAndOverride: jest.fn() };
  const userRepo = { findOne: jest.fn() };
  const db = { getRepository: jest.fn(() => userRepo) };
  const guard = new JwtAuthGuard(
    reflector as unknown as Reflector,
    db as unknown as DatabaseService,
    tokens,
  );

  const doctorRow = {
    id: 5,
    email: 'doc@example.com',
    role: UserRole.DOCTOR,
    clinicId: 2,
    isSuperuser: false,
    isActive: true,
  };

  beforeEach(() => {
    jest.clearAllMocks();
    reflector.getAllAndOverride.mockReturnValue(false);
  });

  it('should let public routes through without a token', async () => {
    reflector.getAllAndOverride.mockReturnValue(true);

    await expect(guard.canActivate(contextFor({ headers: {} }))).resolves.toBe(true);
    expect(db.getRepository).not.toHaveBeenCalled();
  });

  it('should reject a request without credentials', async () => {
    await expect(guard.canActivate(contextFor({ headers: {} }))).rejects.toThrow(
      'Authentication credentials were not provided.',
    );
  });

  it('should attach the current user for a valid access token', async () => {
    userRepo.findOne.mockResolvedValue(doctorRow);
    const token = tokens.issue({ id: 5, role: UserRole.DOCTOR, clinicId: 2 }, 'access');
    const request: Partial<Request> = { headers: { authorization: `Bearer ${token}` } };

    await expect(guard.canActivate(contextFor(request))).resolves.toBe(true);
    expect(request.user).toEqual({
      userId: 5,
      email: 'doc@example.com',
      role: UserRole.DOCTOR,
      clinicId: 2,
      isSuperuser: false,
    });
    expect(userRepo.findOne).toHaveBeenCalledWith({ where: { id: 5, isDeleted: false } });
  });

  it('should reject a refresh token used as access token', async () => {
    const token = tokens.issue({ id: 5, role: UserRole.DOCTOR, clinicId: 2 }, 'refresh');

    await expect(
      guard.canActivate(contextFor({ headers: { authorization: `Bearer ${token}` } })),
    ).rejects.toThrow(UnauthorizedException);
  });

  it('should reject an inactive user', async () => {
    userRepo.findOne.mockResolvedValue({ ...doctorRow, isActive: false });
    const token = tokens.issue({ id: 5, role: UserRole.DOCTOR, clinicId: 2 }, 'access');

    await expect(
      guard.canActivate(contextFor({ headers: { authorization: `Bearer ${token}` } })),
    ).rejects.toThrow('User is inactive.');
  });
});
