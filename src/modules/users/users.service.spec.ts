/**
 * Users Service Unit Tests
 */

import { Test, TestingModule } from '@nestjs/testing';
import { ForbiddenException, NotFoundException } from '@nestjs/common';
import { EntityTarget, ObjectLiteral, QueryFailedError } from 'typeorm';
import { DatabaseService } from '../../common/database/database.service';
import { PasswordService } from '../../common/auth/services/password.service';
import { ApiValidationException } from '../../common/http/api-validation.exception';
import { TenantContext } from '../../common/tenancy/tenant-context';
import { UserRole } from '../../common/types/roles';
import { Clinic } from '../clinics/entities/clinic.entity';
import { User } from './entities/user.entity';
import { CreateUserDto, ListUsersQueryDto } from './dto/user.dto';
import { UsersService } from './users.service';

describe('UsersService', () => {
  let service: UsersService;

  const userRepo = {
    findOne: jest.fn(),
    findOneOrFail: jest.fn(),
    findAndCount: jest.fn(),
    exists: jest.fn(),
    create: jest.fn((data: ObjectLiteral) => ({ ...data })),
    merge: jest.fn((target: ObjectLiteral, data: ObjectLiteral) => Object.assign(target, data)),
    save: jest.fn(async (entity: ObjectLiteral) => ({ id: 30, ...entity })),
  };
  const clinicRepo = { exists: jest.fn() };
  const repo = (entity: EntityTarget<ObjectLiteral>) => (entity === Clinic ? clinicRepo : userRepo);
  const mockManager = { getRepository: jest.fn(repo) };
  const mockDatabaseService = {
    getRepository: jest.fn(repo),
    withTransaction: jest.fn((work: (manager: typeof mockManager) => Promise<unknown>) => work(mockManager)),
  };
  const mockPasswordService = {
    hash: jest.fn(async (password: string) => `hashed:${password}`),
  };

  const admin: TenantContext = { userId: 1, clinicId: 10, role: UserRole.ADMIN, isSuperuser: false };
  const doctorRow = {
    id: 30,
    email: 'new.doctor@example.com',
    passwordHash: 'hashed:password123',
    firstName: 'Nia',
    lastName: 'Okafor',
    clinicId: 10,
    clinic: { id: 10, name: 'Smile Studio' },
    role: UserRole.DOCTOR,
    contactNumber: null,
    secondaryContactNumber: null,
    address: null,
    degree: 'DDS',
    isActive: true,
    isSuperuser: false,
    isDeleted: false,
    createdAt: new Date('2026-02-01T00:00:00Z'),
    updatedAt: new Date('2026-02-01T00:00:00Z'),
  };

  const createDto: CreateUserDto = {
    email: 'new.doctor@example.com',
    password: 'password123',
    role: UserRole.DOCTOR,
    firstName: 'Nia',
    lastName: 'Okafor',
    degree: 'DDS',
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: DatabaseService, useValue: mockDatabaseService },
        { provide: PasswordService, useValue: mockPasswordService },
      ],
    }).compile();

    service = module.get<UsersService>(UsersService);
    jest.clearAllMocks();
    userRepo.exists.mockResolvedValue(false);
    clinicRepo.exists.mockResolvedValue(true);
  });

  describe('create()', () => {
    it('should create the user in the caller clinic with a hashed password', async () => {
      userRepo.findOneOrFail.mockResolvedValue(doctorRow);

      const result = await service.create(admin, createDto);

      expect(userRepo.create).toHaveBeenCalledWith(
        expect.objectContaining({
          email: 'new.doctor@example.com',
          passwordHash: 'hashed:password123',
          clinicId: 10,
          role: UserRole.DOCTOR,
          isActive: true,
          createdById: 1,
        }),
      );
      expect(result.fullName).toBe('Nia Okafor');
      expect(result.clinicName).toBe('Smile Studio');
      expect(result).not.toHaveProperty('passwordHash');
    });

    it('should reject an email that is already registered', async () => {
      userRepo.exists.mockResolvedValue(true);

      await expect(service.create(admin, createDto)).rejects.toThrow(ApiValidationException);
      expect(userRepo.save).not.toHaveBeenCalled();
    });

    it('should report an email taken by a concurrent insert', async () => {
      const duplicate = Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
      userRepo.save.mockRejectedValueOnce(new QueryFailedError('INSERT INTO "users"', [], duplicate));

      await expect(service.create(admin, createDto)).rejects.toMatchObject({
        details: { email: ['Email already registered.'] },
      });
    });

    it('should pass other database errors through', async () => {
      const deadlock = Object.assign(new Error('deadlock detected'), { code: '40P01' });
      const failure = new QueryFailedError('INSERT INTO "users"', [], deadlock);
      userRepo.save.mockRejectedValueOnce(failure);

      await expect(service.create(admin, createDto)).rejects.toBe(failure);
    });

    it('should not let an admin create users in another clinic', async () => {
      await expect(service.create(admin, { ...createDto, clinic: 11 })).rejects.toThrow(ForbiddenException);
      expect(mockDatabaseService.withTransaction).not.toHaveBeenCalled();
    });

    it('should reject a deleted or unknown clinic', async () => {
      clinicRepo.exists.mockResolvedValue(false);

      await expect(service.create(admin, createDto)).rejects.toThrow(ApiValidationException);
    });
  });

  describe('findOne()', () => {
    it('should not find users of another clinic', async () => {
      userRepo.findOne.mockResolvedValue(null);

      await expect(service.findOne(admin, 99)).rejects.toThrow(NotFoundException);
      expect(userRepo.findOne).toHaveBeenCalledWith({
        where: { clinicId: 10, isDeleted: false, id: 99 },
        relations: { clinic: true },
      });
    });
  });

  describe('findByRole()', () => {
    it('should list active users of the role', async () => {
      userRepo.findAndCount.mockResolvedValue([[doctorRow], 1]);

      const page = await service.findByRole(admin, UserRole.DOCTOR, new ListUsersQueryDto(), '/api/v1/users/doctors');

      expect(userRepo.findAndCount).toHaveBeenCalledWith(
        expect.objectContaining({
          where: [{ clinicId: 10, isDeleted: false, role: UserRole.DOCTOR }],
        }),
      );
      expect(page.items.map((user) => user.id)).toEqual([30]);
    });
  });

  describe('remove()', () => {
    it('should soft delete and record who did it', async () => {
      userRepo.findOne.mockResolvedValue({ ...doctorRow });

      await service.remove(admin, 30);

      expect(userRepo.save).toHaveBeenCalledWith(
        expect.objectContaining({ id: 30, isDeleted: true, updatedById: 1 }),
      );
    });
  });

  describe('restore()', () => {
    it('should search deleted users within the clinic', async () => {
      userRepo.findOne.mockResolvedValue({ ...doctorRow, isDeleted: true });

      const restored = await service.restore(admin, 30);

      expect(userRepo.findOne).toHaveBeenCalledWith({ where: { clinicId: 10, id: 30 }, relations: { clinic: true } });
      expect(restored.isDeleted).toBe(false);
    });
  });
});
