/**
 * Dental Clinic API - Patients Controller
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
import { PatientsService } from './patients.service';
import { AssignDoctorDto, CreatePatientDto, ListPatientsQueryDto, UpdatePatientDto } from './dto/patient.dto';

@ApiTags('patients')
@ApiBearerAuth('jwt')
@Controller('patients')
export class PatientsController {
  constructor(private readonly patientsService: PatientsService) {}

  @Get()
  @Policy('patient.read')
  @ApiOperation({ summary: 'List patients in the current clinic with pagination and search' })
  async findAll(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: ListPatientsQueryDto,
    @RequestUrl() url: string,
  ) {
    const mode = queryModeFor(query.includeDeleted, isAllowed('patient.includeDeleted', user));
    return paginated(await this.patientsService.findAll(user, query, mode, url), 'Patients retrieved');
  }

  @Post()
  @Policy('patient.create')
  @ApiOperation({ summary: 'Create a patient record' })
  async create(@CurrentUser() user: AuthenticatedUser, @Body() dto: CreatePatientDto) {
    return ok(await this.patientsService.create(user, dto), 'Patient created successfully');
  }

  @Get(':id')
  @Policy('patient.read')
  @ApiOperation({ summary: 'Get patient details with treatments' })
  async findOne(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.patientsService.findOne(user, id), 'Patient retrieved');
  }

  @Put(':id')
  @Policy('patient.update')
  @ApiOperation({ summary: 'Update a patient record' })
  async update(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdatePatientDto,
  ) {
    return ok(await this.patientsService.update(user, id, dto), 'Patient updated successfully');
  }

  @Patch(':id')
  @Policy('patient.update')
  @ApiOperation({ summary: 'Partially update a patient record' })
  async partialUpdate(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdatePatientDto,
  ) {
    return this.update(user, id, dto);
  }

  @Delete(':id')
  @Policy('patient.delete')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Soft-delete a patient record' })
  async remove(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    await this.patientsService.remove(user, id);
    return ok(null, 'Patient deleted successfully');
  }

  @Post(':id/assign-doctor')
  @Policy('patient.assignDoctor')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Assign a doctor to a patient' })
  async assignDoctor(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: AssignDoctorDto,
  ) {
    return ok(await this.patientsService.assignDoctor(user, id, dto.doctor), 'Doctor assigned successfully');
  }

  @Get(':id/medical-summary')
  @Policy('patient.read')
  @ApiOperation({ summary: 'Get a compact medical summary' })
  async medicalSummary(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.patientsService.medicalSummary(user, id), 'Medical summary retrieved');
  }

  @Post(':id/restore')
  @Policy('patient.restore')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Restore a soft-deleted patient record' })
  async restore(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.patientsService.restore(user, id), 'Patient restored successfully');
  }
}
