import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { IsBoolean, IsIn, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { PageQueryDto } from '../../../common/http/pagination';
import { ToBoolean, TrimToUndefined } from '../../../common/http/query-transforms';
import { IsOmittable } from '../../../common/validation/optional';
import { IsPhoneNumberFormat } from '../../../common/validation/phone-number';

export const CLINIC_ORDERINGS = ['name', '-name', 'createdAt', '-createdAt'] as const;
export type ClinicOrdering = (typeof CLINIC_ORDERINGS)[number];

export class CreateClinicDto {
  @ApiProperty({ maxLength: 255 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @ApiProperty({ example: '+1 555-123-4567' })
  @IsString()
  @IsPhoneNumberFormat()
  contactNumber!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  address!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ default: true })
  @IsOmittable()
  @IsBoolean()
  isActive?: boolean;
}

export class UpdateClinicDto extends PartialType(CreateClinicDto, { skipNullProperties: false }) {}

export class ListClinicsQueryDto extends PageQueryDto {
  @ApiPropertyOptional({ description: 'Search by name, contact number or address' })
  @IsOptional()
  @TrimToUndefined()
  @IsString()
  search?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  isActive?: boolean;

  @ApiPropertyOptional({ enum: CLINIC_ORDERINGS, default: '-createdAt' })
  @IsOptional()
  @IsIn(CLINIC_ORDERINGS)
  ordering?: ClinicOrdering;

  @ApiPropertyOptional({ description: 'Administrators only' })
  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  includeDeleted?: boolean;
}
