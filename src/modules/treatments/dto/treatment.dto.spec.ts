import { ArgumentMetadata } from '@nestjs/common';
import { createValidationPipe } from '../../../common/http/http-setup';
import { CreateTreatmentDto, ListTreatmentsQueryDto, UpdateTreatmentDto } from './treatment.dto';

describe('treatment DTOs', () => {
  const pipe = createValidationPipe();
  const update: ArgumentMetadata = { type: 'body', metatype: UpdateTreatmentDto };

  it('should reject null treatment information and status', async () => {
    await expect(pipe.transform({ treatmentInformation: null, status: null }, update)).rejects.toMatchObject({
      details: {
        treatmentInformation: expect.arrayContaining(['treatmentInformation must be a string']),
        status: expect.arrayContaining([expect.stringContaining('status must be one of the following values')]),
      },
    });
  });

  it('should let the doctor and next visit be cleared', async () => {
    await expect(pipe.transform({ doctor: null, nextVisitDate: null }, update)).resolves.toEqual({
      doctor: null,
      nextVisitDate: null,
    });
  });

  it('should reject a patient id beyond the key range', async () => {
    const create = { patient: 2147483648, treatmentType: 'SCALING', treatmentInformation: 'Routine check' };

    await expect(pipe.transform(create, { type: 'body', metatype: CreateTreatmentDto })).rejects.toMatchObject({
      details: { patient: ['patient must not be greater than 2147483647'] },
    });
  });

  it('should reject a doctor filter beyond the key range', async () => {
    await expect(
      pipe.transform({ doctor: '3000000000' }, { type: 'query', metatype: ListTreatmentsQueryDto }),
    ).rejects.toMatchObject({
      details: { doctor: ['doctor must not be greater than 2147483647'] },
    });
  });
});
