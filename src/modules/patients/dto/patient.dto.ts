import { ApiProperty, ApiPropertyOptional, OmitType, PartialType } from '@nestjs/swagger';
import {
  IsBoolean,
  IsDateString,
  IsEmail,
  IsEnum,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { PageQueryDto } from '../../../common/http/pagination';
import { ToBoolean, TrimToUndefined } from '../../../common/http/query-transforms';
import { IsOmittable } from '../../../common/validation/optional';
import { IsPhoneNumberFormat } from '../../../common/validation/phone-number';
import { IsRecordId } from '../../../common/validation/record-id';
import { Gender } from '../entities/patient.entity';

export const PATIENT_ORDERINGS = ['firstName', '-firstName', 'lastName', '-lastName', 'createdAt', '-createdAt'] as const;
export type PatientOrdering = (typeof PATIENT_ORDERINGS)[number];

export class CreatePatientDto {
  @ApiProperty({ maxLength: 100 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  firstName!: string;

  @ApiProperty({ maxLength: 100 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  lastName!: string;

  @ApiProperty()
  @IsEmail({}, { message: 'Enter a valid email address.' })
  email!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @TrimToUndefined()
  @IsString()
  @IsPhoneNumberFormat()
  contactNumber?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @TrimToUndefined()
  @IsString()
  @IsPhoneNumberFormat()
  secondaryContactNumber?: string;

  @ApiPropertyOptional({ enum: Gender })
  @IsOptional()
  @IsEnum(Gender)
  gender?: Gender;

  @ApiPropertyOptional({ example: '1990-04-21' })
  @IsOptional()
  @IsDateString({ strict: true }, { message: 'Date of birth must be a valid date (YYYY-MM-DD).' })
  dateOfBirth?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  address?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  medicalHistory?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  allergies?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  clinicalHistory?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;

  @ApiPropertyOptional({ description: 'Doctor user id; null to leave unassigned', nullable: true })
  @IsOptional()
  @IsRecordId()
  assignedDoctor?: number | null;

  @ApiPropertyOptional({ description: 'Target clinic id. Required for superusers without a clinic.' })
  @IsOptional()
  @IsRecordId()
  clinic?: number;

  @ApiPropertyOptional({ default: true })
  @IsOmittable()
  @IsBoolean()
  isActive?: boolean;
}

export class UpdatePatientDto extends PartialType(OmitType(CreatePatientDto, ['clinic'] as const), {
  skipNullProperties: false,
}) {}

export class AssignDoctorDto {
  @ApiProperty({ description: 'Doctor user id' })
  @IsRecordId()
  doctor!: number;
}

export class ListPatientsQueryDto extends PageQueryDto {
  @ApiPropertyOptional({ description: 'Search by name, email or contact number' })
  @IsOptional()
  @TrimToUndefined()
  @IsString()
  search?: string;

  @ApiPropertyOptional({ enum: Gender })
  @IsOptional()
  @IsEnum(Gender)
  gender?: Gender;

  @ApiPropertyOptional({ description: 'Filter by assigned doctor id' })
  @IsOptional()
  @IsRecordId()
  assignedDoctor?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  isActive?: boolean;

  @ApiPropertyOptional({ enum: PATIENT_ORDERINGS, default: '-createdAt' })
  @IsOptional()
  @IsIn(PATIENT_ORDERINGS)
  ordering?: PatientOrdering;

  @ApiPropertyOptional({ description: 'Administrators only' })
  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  includeDeleted?: boolean;
}
