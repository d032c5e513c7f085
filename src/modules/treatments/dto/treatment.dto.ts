import { ApiProperty, ApiPropertyOptional, PartialType, PickType } from '@nestjs/swagger';
import {
  IsBoolean,
  IsDateString,
  IsEnum,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
} from 'class-validator';
import { PageQueryDto } from '../../../common/http/pagination';
import { ToBoolean, TrimToUndefined } from '../../../common/http/query-transforms';
import { IsOmittable } from '../../../common/validation/optional';
import { IsRecordId } from '../../../common/validation/record-id';
import { TreatmentStatus, TreatmentType } from '../entities/treatment.entity';

export const TREATMENT_ORDERINGS = [
  'nextVisitDate',
  '-nextVisitDate',
  'createdAt',
  '-createdAt',
  'status',
  '-status',
] as const;
export type TreatmentOrdering = (typeof TREATMENT_ORDERINGS)[number];

export class CreateTreatmentDto {
  @ApiProperty({ description: 'Patient id' })
  @IsRecordId()
  patient!: number;

  @ApiPropertyOptional({ description: 'Doctor user id', nullable: true })
  @IsOptional()
  @IsRecordId()
  doctor?: number | null;

  @ApiProperty({ enum: TreatmentType })
  @IsEnum(TreatmentType)
  treatmentType!: TreatmentType;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  treatmentInformation!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  treatmentFindings?: string;

  @ApiPropertyOptional({
    description: 'Base64 data URI (data:image/png;base64,...). Empty placeholders are ignored.',
  })
  @IsOptional()
  uploadImage?: unknown;

  @ApiPropertyOptional({ example: '2026-03-01T10:00:00Z', nullable: true })
  @IsOptional()
  @IsDateString({}, { message: 'Next visit date must be a valid ISO 8601 date.' })
  nextVisitDate?: string | null;

  @ApiPropertyOptional({ enum: TreatmentStatus, default: TreatmentStatus.SCHEDULED })
  @IsOmittable()
  @IsEnum(TreatmentStatus)
  status?: TreatmentStatus;

  @ApiPropertyOptional({ description: 'Target clinic id. Required for superusers without a clinic.' })
  @IsOptional()
  @IsRecordId()
  clinic?: number;
}

export class UpdateTreatmentDto extends PartialType(
  PickType(CreateTreatmentDto, [
    'doctor',
    'treatmentInformation',
    'treatmentFindings',
    'uploadImage',
    'nextVisitDate',
    'status',
  ] as const),
  { skipNullProperties: false },
) {}

export class UploadImageDto {
  @ApiPropertyOptional({ description: 'Base64 data URI, used when no multipart file is sent' })
  @IsOptional()
  uploadImage?: unknown;
}

export class ListTreatmentsQueryDto extends PageQueryDto {
  @ApiPropertyOptional({ description: 'Search by patient name or email, or treatment information' })
  @IsOptional()
  @TrimToUndefined()
  @IsString()
  search?: string;

  @ApiPropertyOptional({ enum: TreatmentStatus })
  @IsOptional()
  @IsEnum(TreatmentStatus)
  status?: TreatmentStatus;

  @ApiPropertyOptional({ enum: TreatmentType })
  @IsOptional()
  @IsEnum(TreatmentType)
  treatmentType?: TreatmentType;

  @ApiPropertyOptional({ description: 'Filter by patient id' })
  @IsOptional()
  @IsRecordId()
  patient?: number;

  @ApiPropertyOptional({ description: 'Filter by doctor id' })
  @IsOptional()
  @IsRecordId()
  doctor?: number;

  @ApiPropertyOptional({ description: 'Next visit on or after this date' })
  @IsOptional()
  @IsDateString()
  nextVisitDateAfter?: string;

  @ApiPropertyOptional({ description: 'Next visit on or before this date' })
  @IsOptional()
  @IsDateString()
  nextVisitDateBefore?: string;

  @ApiPropertyOptional({ enum: TREATMENT_ORDERINGS, default: '-createdAt' })
  @IsOptional()
  @IsIn(TREATMENT_ORDERINGS)
  ordering?: TreatmentOrdering;

  @ApiPropertyOptional({ description: 'Administrators only' })
  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  includeDeleted?: boolean;
}
