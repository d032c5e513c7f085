/**
 * Dental Clinic API - Clinics Controller
 */

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
import { ClinicsService } from './clinics.service';
import { CreateClinicDto, ListClinicsQueryDto, UpdateClinicDto } from './dto/clinic.dto';

@ApiTags('clinics')
@ApiBearerAuth('jwt')
@Controller('clinics')
export class ClinicsController {
  constructor(private readonly clinicsService: ClinicsService) {}

  @Get()
  @Policy('clinic.read')
  @ApiOperation({ summary: 'List clinics visible to the current user' })
  async findAll(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: ListClinicsQueryDto,
    @RequestUrl() url: string,
  ) {
    const mode = queryModeFor(query.includeDeleted, isAllowed('clinic.includeDeleted', user));
    const page = await this.clinicsService.findAll(user, query, mode, url);
    return paginated(page, 'Clinics retrieved');
  }

  @Post()
  @Policy('clinic.create')
  @ApiOperation({ summary: 'Create a clinic' })
  async create(@CurrentUser() user: AuthenticatedUser, @Body() dto: CreateClinicDto) {
    return ok(await this.clinicsService.create(user, dto), 'Clinic created successfully');
  }

  @Get(':id')
  @Policy('clinic.read')
  @ApiOperation({ summary: 'Get clinic details' })
  async findOne(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.clinicsService.findOne(user, id), 'Clinic retrieved');
  }

  @Put(':id')
  @Policy('clinic.update')
  @ApiOperation({ summary: 'Update a clinic' })
  async update(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdateClinicDto,
  ) {
    return ok(await this.clinicsService.update(user, id, dto), 'Clinic updated successfully');
  }

  @Patch(':id')
  @Policy('clinic.update')
  @ApiOperation({ summary: 'Partially update a clinic' })
  async partialUpdate(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdateClinicDto,
  ) {
    return this.update(user, id, dto);
  }

  @Delete(':id')
  @Policy('clinic.delete')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Soft-delete a clinic' })
  async remove(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    await this.clinicsService.remove(user, id);
    return ok(null, 'Clinic deleted successfully');
  }

  @Get(':id/statistics')
  @Policy('clinic.statistics')
  @ApiOperation({ summary: 'Get clinic statistics' })
  async statistics(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.clinicsService.statistics(user, id), 'Clinic statistics retrieved');
  }

  @Post(':id/restore')
  @Policy('clinic.restore')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Restore a soft-deleted clinic' })
  async restore(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.clinicsService.restore(user, id), 'Clinic restored successfully');
  }
}
