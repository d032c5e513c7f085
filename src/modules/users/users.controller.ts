import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentUser, Policy } from '../../common/auth/decorators';
import { AuthenticatedUser } from '../../common/auth/guards/jwt-auth.guard';
import { isAllowed } from '../../common/auth/policy/policy.table';
import { ok, paginated } from '../../common/http/api-response';
import { ParseIdPipe } from '../../common/http/parse-id.pipe';
import { RequestUrl } from '../../common/http/request-url.decorator';
import { queryModeFor } from '../../common/tenancy/tenant-scope';
import { UserRole } from '../../common/types/roles';
import { UsersService } from './users.service';
import { CreateUserDto, ListUsersQueryDto, UpdateUserDto } from './dto/user.dto';

@ApiTags('users')
@ApiBearerAuth('jwt')
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  @Policy('user.read')
  @ApiOperation({ summary: 'List users in the current clinic' })
  async findAll(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: ListUsersQueryDto,
    @RequestUrl() url: string,
  ) {
    const mode = queryModeFor(query.includeDeleted, isAllowed('user.includeDeleted', user));
    return paginated(await this.usersService.findAll(user, query, mode, url), 'Users retrieved');
  }

  @Post()
  @Policy('user.create')
  @ApiOperation({ summary: 'Create a doctor or administrator account' })
  async create(@CurrentUser() user: AuthenticatedUser, @Body() dto: CreateUserDto) {
    return ok(await this.usersService.create(user, dto), 'User created successfully');
  }

  @Get('doctors')
  @Policy('user.listDoctors')
  @ApiOperation({ summary: 'List doctors in the current clinic' })
  async doctors(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: ListUsersQueryDto,
    @RequestUrl() url: string,
  ) {
    return paginated(await this.usersService.findByRole(user, UserRole.DOCTOR, query, url), 'Doctors retrieved');
  }

  @Get('admins')
  @Policy('user.listAdmins')
  @ApiOperation({ summary: 'List administrators in the current clinic' })
  async admins(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: ListUsersQueryDto,
    @RequestUrl() url: string,
  ) {
    return paginated(await this.usersService.findByRole(user, UserRole.ADMIN, query, url), 'Admin users retrieved');
  }

  @Get(':id')
  @Policy('user.read')
  @ApiOperation({ summary: 'Get user details' })
  async findOne(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.usersService.findOne(user, id), 'User retrieved');
  }

  @Put(':id')
  @Policy('user.update')
  @ApiOperation({ summary: 'Update a user' })
  async update(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdateUserDto,
  ) {
    return ok(await this.usersService.update(user, id, dto), 'User updated successfully');
  }

  @Patch(':id')
  @Policy('user.update')
  @ApiOperation({ summary: 'Partially update a user' })
  async partialUpdate(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdateUserDto,
  ) {
    return this.update(user, id, dto);
  }

  @Delete(':id')
  @Policy('user.delete')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Soft-delete a user' })
  async remove(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    await this.usersService.remove(user, id);
    return ok(null, 'User deleted successfully');
  }

  @Post(':id/restore')
  @Policy('user.restore')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Restore a soft-deleted user' })
  async restore(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.usersService.restore(user, id), 'User restored successfully');
  }
}
