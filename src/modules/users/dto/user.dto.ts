import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsEmail,
  IsEnum,
  IsIn,
  IsOptional,
  IsString,
  MaxLength,
  MinLength,
} from 'class-validator';
import { PageQueryDto } from '../../../common/http/pagination';
import { ToBoolean, TrimToUndefined } from '../../../common/http/query-transforms';
import { IsOmittable } from '../../../common/validation/optional';
import { IsPhoneNumberFormat } from '../../../common/validation/phone-number';
import { IsRecordId } from '../../../common/validation/record-id';
import { UserRole } from '../../../common/types/roles';

export const USER_ORDERINGS = ['firstName', '-firstName', 'createdAt', '-createdAt'] as const;
export type UserOrdering = (typeof USER_ORDERINGS)[number];

/**
 * Profile fields shared by registration, user management and `PUT /auth/me`.
 */
export class UserProfileFieldsDto {
  @ApiPropertyOptional({ maxLength: 150 })
  @IsOmittable()
  @IsString()
  @MaxLength(150)
  firstName?: string;

  @ApiPropertyOptional({ maxLength: 150 })
  @IsOmittable()
  @IsString()
  @MaxLength(150)
  lastName?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @IsPhoneNumberFormat()
  contactNumber?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @TrimToUndefined()
  @IsString()
  @IsPhoneNumberFormat()
  secondaryContactNumber?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  address?: string;

  @ApiPropertyOptional({ maxLength: 100 })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  degree?: string;
}

export class CreateUserDto extends UserProfileFieldsDto {
  @ApiProperty()
  @IsEmail({}, { message: 'Enter a valid email address.' })
  email!: string;

  @ApiProperty({ minLength: 8 })
  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters.' })
  password!: string;

  @ApiProperty({ enum: UserRole })
  @IsEnum(UserRole, { message: 'Role must be DOCTOR or ADMIN. Patients are managed separately.' })
  role!: UserRole;

  @ApiPropertyOptional({ description: 'Target clinic id. Required for superusers without a clinic.' })
  @IsOptional()
  @IsRecordId()
  clinic?: number;

  @ApiPropertyOptional({ default: true })
  @IsOmittable()
  @IsBoolean()
  isActive?: boolean;
}

export class UpdateUserDto extends UserProfileFieldsDto {
  @ApiPropertyOptional({ enum: UserRole })
  @IsOmittable()
  @IsEnum(UserRole, { message: 'Role must be DOCTOR or ADMIN. Patients are managed separately.' })
  role?: UserRole;

  @ApiPropertyOptional()
  @IsOmittable()
  @IsBoolean()
  isActive?: boolean;
}

export class ListUsersQueryDto extends PageQueryDto {
  @ApiPropertyOptional({ description: 'Search by name, email or contact number' })
  @IsOptional()
  @TrimToUndefined()
  @IsString()
  search?: string;

  @ApiPropertyOptional({ enum: UserRole })
  @IsOptional()
  @IsEnum(UserRole)
  role?: UserRole;

  @ApiPropertyOptional()
  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  isActive?: boolean;

  @ApiPropertyOptional({ enum: USER_ORDERINGS, default: '-createdAt' })
  @IsOptional()
  @IsIn(USER_ORDERINGS)
  ordering?: UserOrdering;

  @ApiPropertyOptional({ description: 'Administrators only' })
  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  includeDeleted?: boolean;
}
