import { ArgumentMetadata } from '@nestjs/common';
import { createValidationPipe } from '../../../common/http/http-setup';
import { RegisterDto } from '../../auth/dto/auth.dto';
import { UpdateUserDto } from './user.dto';

describe('user DTOs', () => {
  const pipe = createValidationPipe();
  const update: ArgumentMetadata = { type: 'body', metatype: UpdateUserDto };

  it('should reject null names, role and active flag', async () => {
    await expect(
      pipe.transform({ firstName: null, lastName: null, role: null, isActive: null }, update),
    ).rejects.toMatchObject({
      details: {
        firstName: expect.arrayContaining(['firstName must be a string']),
        lastName: expect.arrayContaining(['lastName must be a string']),
        role: ['Role must be DOCTOR or ADMIN. Patients are managed separately.'],
        isActive: ['isActive must be a boolean value'],
      },
    });
  });

  it('should let optional contact details be cleared', async () => {
    await expect(pipe.transform({ degree: null, address: null }, update)).resolves.toEqual({
      degree: null,
      address: null,
    });
  });

  it('should ask for a clinic when the registration clinic id is out of range', async () => {
    const register = {
      email: 'new.doctor@example.com',
      password: 'password123',
      clinicId: 3000000000,
      role: 'DOCTOR',
    };

    await expect(pipe.transform(register, { type: 'body', metatype: RegisterDto })).rejects.toMatchObject({
      details: { clinicId: ['Please select a clinic.'] },
    });
  });
});
