/**
 * Dental Clinic API - Auth Controller
 */

import { Body, Controller, Get, HttpCode, HttpStatus, Post, Put, Query } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentUser, Policy, Public } from '../../common/auth/decorators';
import { AuthenticatedUser } from '../../common/auth/guards/jwt-auth.guard';
import { ok, paginated } from '../../common/http/api-response';
import { RequestUrl } from '../../common/http/request-url.decorator';
import { UserRole } from '../../common/types/roles';
import { ListUsersQueryDto } from '../users/dto/user.dto';
import { UsersService } from '../users/users.service';
import { AuthService } from './auth.service';
import {
  ChangePasswordDto,
  LoginDto,
  LogoutDto,
  RefreshTokenDto,
  RegisterDto,
  UpdateProfileDto,
} from './dto/auth.dto';

@ApiTags('auth')
@Controller('auth')
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly usersService: UsersService,
  ) {}

  @Post('register')
  @Public()
  @ApiOperation({ summary: 'Register a doctor or administrator account' })
  async register(@Body() dto: RegisterDto) {
    return ok(await this.authService.register(dto), 'User registered successfully');
  }

  @Post('login')
  @Public()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange credentials for access and refresh tokens' })
  async login(@Body() dto: LoginDto) {
    return ok(await this.authService.login(dto), 'Login successful');
  }

  @Post('refresh')
  @Public()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange a refresh token for a new access token' })
  async refresh(@Body() dto: RefreshTokenDto) {
    return ok(await this.authService.refresh(dto.refresh), 'Token refreshed');
  }

  @Post('logout')
  @ApiBearerAuth('jwt')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Revoke a refresh token' })
  async logout(@CurrentUser() user: AuthenticatedUser, @Body() dto: LogoutDto) {
    await this.authService.logout(user, dto.refresh);
    return ok(null, 'Logout successful');
  }

  @Get('me')
  @ApiBearerAuth('jwt')
  @ApiOperation({ summary: 'Get the current user profile' })
  async me(@CurrentUser() user: AuthenticatedUser) {
    return ok(await this.authService.me(user), 'Profile retrieved successfully');
  }

  @Put('me')
  @ApiBearerAuth('jwt')
  @ApiOperation({ summary: 'Update the current user profile' })
  async updateProfile(@CurrentUser() user: AuthenticatedUser, @Body() dto: UpdateProfileDto) {
    return ok(await this.authService.updateProfile(user, dto), 'Profile updated successfully');
  }

  @Post('change-password')
  @ApiBearerAuth('jwt')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Change the current user password' })
  async changePassword(@CurrentUser() user: AuthenticatedUser, @Body() dto: ChangePasswordDto) {
    return ok(await this.authService.changePassword(user, dto), 'Password changed successfully');
  }

  @Get('doctors')
  @ApiBearerAuth('jwt')
  @Policy('user.listDoctors')
  @ApiOperation({ summary: 'List doctors in the current clinic' })
  async doctors(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: ListUsersQueryDto,
    @RequestUrl() url: string,
  ) {
    return paginated(await this.usersService.findByRole(user, UserRole.DOCTOR, query, url), 'Doctors retrieved');
  }
}
