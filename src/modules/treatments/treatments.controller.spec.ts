/**
 * Treatments Controller Unit Tests
 *
 * Envelope shapes and the two ways of sending an image, called directly and
 * over HTTP with the application's body parser and validation.
 */

import { NestExpressApplication } from '@nestjs/platform-express';
import { Test, TestingModule } from '@nestjs/testing';
import { NextFunction, Request } from 'express';
import { AuthenticatedUser } from '../../common/auth/guards/jwt-auth.guard';
import { ApiValidationException } from '../../common/http/api-validation.exception';
import { configureRequestPipeline } from '../../common/http/http-setup';
import { UserRole } from '../../common/types/roles';
import { ListTreatmentsQueryDto } from './dto/treatment.dto';
import { TreatmentStatus } from './entities/treatment.entity';
import { TreatmentsController } from './treatments.controller';
import { TreatmentsService } from './treatments.service';

describe('TreatmentsController', () => {
  let controller: TreatmentsController;

  const mockTreatmentsService = {
    findAll: jest.fn(),
    findByStatus: jest.fn(),
    remove: jest.fn(),
    uploadImage: jest.fn(),
  };

  const admin: AuthenticatedUser = {
    userId: 1,
    email: 'admin@example.com',
    clinicId: 10,
    role: UserRole.ADMIN,
    isSuperuser: false,
  };
  const doctor: AuthenticatedUser = { ...admin, userId: 7, email: 'doc@example.com', role: UserRole.DOCTOR };

  const emptyPage = {
    items: [],
    pagination: { count: 0, next: null, previous: null, page: 1, pageSize: 20, totalPages: 1 },
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [TreatmentsController],
      providers: [{ provide: TreatmentsService, useValue: mockTreatmentsService }],
    }).compile();

    controller = module.get<TreatmentsController>(TreatmentsController);
    jest.clearAllMocks();
  });

  it('should wrap listings in the paginated envelope', async () => {
    mockTreatmentsService.findAll.mockResolvedValue(emptyPage);

    const result = await controller.findAll(admin, new ListTreatmentsQueryDto(), '/api/v1/treatments');

    expect(result).toEqual({
      success: true,
      message: 'Treatments retrieved',
      data: [],
      pagination: emptyPage.pagination,
    });
    expect(mockTreatmentsService.findAll).toHaveBeenCalledWith(
      admin,
      expect.any(ListTreatmentsQueryDto),
      'active',
      '/api/v1/treatments',
    );
  });

  it('should refuse deleted rows to doctors', async () => {
    const query = Object.assign(new ListTreatmentsQueryDto(), { includeDeleted: true });

    await expect(controller.findAll(doctor, query, '/api/v1/treatments')).rejects.toThrow(
      'Only clinic administrators can view deleted records.',
    );
  });

  it('should name the status in the by-status message', async () => {
    mockTreatmentsService.findByStatus.mockResolvedValue(emptyPage);
    const query = Object.assign(new ListTreatmentsQueryDto(), { status: TreatmentStatus.COMPLETED });

    const result = await controller.byStatus(admin, query, '/api/v1/treatments/by-status?status=COMPLETED');

    expect(result.message).toBe('Treatments with status COMPLETED retrieved');
  });

  it('should confirm deletion with an empty payload', async () => {
    await expect(controller.remove(admin, 3)).resolves.toEqual({
      success: true,
      message: 'Treatment deleted successfully',
      data: null,
    });
  });

  it('should prefer the multipart file', async () => {
    mockTreatmentsService.uploadImage.mockResolvedValue({ id: 3 });
    const file = { buffer: Buffer.from('jpeg'), mimetype: 'image/jpeg', size: 4 };

    await controller.uploadImage(admin, 3, file, {});

    expect(mockTreatmentsService.uploadImage).toHaveBeenCalledWith(admin, 3, {
      buffer: file.buffer,
      mimeType: 'image/jpeg',
    });
  });

  it('should accept a data URI body', async () => {
    mockTreatmentsService.uploadImage.mockResolvedValue({ id: 3 });
    const uploadImage = `data:image/gif;base64,${Buffer.from('gif').toString('base64')}`;

    await controller.uploadImage(admin, 3, undefined, { uploadImage });

    expect(mockTreatmentsService.uploadImage).toHaveBeenCalledWith(
      admin,
      3,
      expect.objectContaining({ mimeType: 'image/gif' }),
    );
  });

  it('should require an image', async () => {
    await expect(controller.uploadImage(admin, 3, undefined, { uploadImage: '' })).rejects.toThrow(
      ApiValidationException,
    );
    expect(mockTreatmentsService.uploadImage).not.toHaveBeenCalled();
  });
});

describe('TreatmentsController over HTTP', () => {
  let app: NestExpressApplication;
  let baseUrl: string;

  const mockTreatmentsService = { uploadImage: jest.fn() };
  const admin: AuthenticatedUser = {
    userId: 1,
    email: 'admin@example.com',
    clinicId: 10,
    role: UserRole.ADMIN,
    isSuperuser: false,
  };

  beforeAll(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [TreatmentsController],
      providers: [{ provide: TreatmentsService, useValue: mockTreatmentsService }],
    }).compile();

    app = module.createNestApplication<NestExpressApplication>();
    app.use((request: Request, _response: unknown, next: NextFunction) => {
      request.user = admin;
      next();
    });
    configureRequestPipeline(app);
    await app.listen(0, '127.0.0.1');
    baseUrl = await app.getUrl();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should accept a 1MB image sent as a data URI', async () => {
    mockTreatmentsService.uploadImage.mockResolvedValue({ id: 1 });
    const png = Buffer.concat([Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]), Buffer.alloc(1024 * 1024)]);

    const response = await fetch(`${baseUrl}/treatments/1/upload-image`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ uploadImage: `data:image/png;base64,${png.toString('base64')}` }),
    });

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({
      success: true,
      message: 'Image uploaded successfully',
      data: { id: 1 },
    });
    expect(mockTreatmentsService.uploadImage).toHaveBeenCalledWith(admin, 1, {
      mimeType: 'image/png',
      buffer: png,
    });
  });

  it('should answer 404 for an id beyond the key range', async () => {
    const response = await fetch(`${baseUrl}/treatments/3000000000/upload-image`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({}),
    });

    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toEqual({ code: 'not_found', message: 'Not found.' });
    expect(mockTreatmentsService.uploadImage).not.toHaveBeenCalled();
  });
});
