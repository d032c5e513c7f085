import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEmail, IsEnum, IsNotEmpty, IsOptional, IsString, MinLength } from 'class-validator';
import { UserRole } from '../../../common/types/roles';
import { IsRecordId } from '../../../common/validation/record-id';
import { UserProfileFieldsDto } from '../../users/dto/user.dto';

export class RegisterDto extends UserProfileFieldsDto {
  @ApiProperty({ example: 'doctor@example.com' })
  @IsEmail({}, { message: 'Enter a valid email address.' })
  @IsNotEmpty({ message: 'Email is required.' })
  email!: string;

  @ApiProperty({ minLength: 8 })
  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters.' })
  password!: string;

  @ApiPropertyOptional({ description: 'Must match password when given' })
  @IsOptional()
  @IsString()
  passwordConfirm?: string;

  @ApiProperty()
  @IsRecordId({ message: 'Please select a clinic.' })
  clinicId!: number;

  @ApiProperty({ enum: UserRole })
  @IsEnum(UserRole, { message: 'Role must be DOCTOR or ADMIN. Patients are managed separately.' })
  role!: UserRole;
}

export class LoginDto {
  @ApiProperty()
  @IsEmail({}, { message: 'Enter a valid email address.' })
  email!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  password!: string;
}

export class RefreshTokenDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  refresh!: string;
}

export class LogoutDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  refresh?: string;
}

export class UpdateProfileDto extends UserProfileFieldsDto {}

export class ChangePasswordDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  oldPassword!: string;

  @ApiProperty({ minLength: 8 })
  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters.' })
  newPassword!: string;

  @ApiProperty({ minLength: 8 })
  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters.' })
  newPasswordConfirm!: string;
}
