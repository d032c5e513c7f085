/**
 * Dental Clinic API - Treatments Controller
 *
 * Static routes (upcoming, overdue, by-status) are declared before `:id`.
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
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBearerAuth, ApiBody, ApiConsumes, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentUser, Policy } from '../../common/auth/decorators';
import { AuthenticatedUser } from '../../common/auth/guards/jwt-auth.guard';
import { isAllowed } from '../../common/auth/policy/policy.table';
import { ApiValidationException } from '../../common/http/api-validation.exception';
import { ok, paginated } from '../../common/http/api-response';
import { ParseIdPipe } from '../../common/http/parse-id.pipe';
import { RequestUrl } from '../../common/http/request-url.decorator';
import { queryModeFor } from '../../common/tenancy/tenant-scope';
import {
  imageFromBody,
  imageFromFile,
  MAX_IMAGE_BYTES,
  UploadedImageFile,
} from '../../common/uploads/image-upload';
import { TreatmentsService } from './treatments.service';
import {
  CreateTreatmentDto,
  ListTreatmentsQueryDto,
  UpdateTreatmentDto,
  UploadImageDto,
} from './dto/treatment.dto';

@ApiTags('treatments')
@ApiBearerAuth('jwt')
@Controller('treatments')
export class TreatmentsController {
  constructor(private readonly treatmentsService: TreatmentsService) {}

  @Get()
  @Policy('treatment.read')
  @ApiOperation({ summary: 'List treatments with filters, search and ordering' })
  async findAll(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: ListTreatmentsQueryDto,
    @RequestUrl() url: string,
  ) {
    const mode = queryModeFor(query.includeDeleted, isAllowed('treatment.includeDeleted', user));
    return paginated(await this.treatmentsService.findAll(user, query, mode, url), 'Treatments retrieved');
  }

  @Post()
  @Policy('treatment.create')
  @ApiOperation({ summary: 'Create a treatment, optionally with a base64 image' })
  async create(@CurrentUser() user: AuthenticatedUser, @Body() dto: CreateTreatmentDto) {
    return ok(await this.treatmentsService.create(user, dto), 'Treatment created successfully');
  }

  @Get('upcoming')
  @Policy('treatment.read')
  @ApiOperation({ summary: 'Ongoing treatments with a future next visit' })
  async upcoming(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: ListTreatmentsQueryDto,
    @RequestUrl() url: string,
  ) {
    return paginated(await this.treatmentsService.findUpcoming(user, query, url), 'Upcoming treatments retrieved');
  }

  @Get('overdue')
  @Policy('treatment.read')
  @ApiOperation({ summary: 'Ongoing treatments whose next visit has passed' })
  async overdue(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: ListTreatmentsQueryDto,
    @RequestUrl() url: string,
  ) {
    return paginated(await this.treatmentsService.findOverdue(user, query, url), 'Overdue treatments retrieved');
  }

  @Get('by-status')
  @Policy('treatment.read')
  @ApiOperation({ summary: 'Treatments with the given status' })
  async byStatus(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: ListTreatmentsQueryDto,
    @RequestUrl() url: string,
  ) {
    const page = await this.treatmentsService.findByStatus(user, query, url);
    return paginated(page, `Treatments with status ${query.status} retrieved`);
  }

  @Get(':id')
  @Policy('treatment.read')
  @ApiOperation({ summary: 'Get treatment details' })
  async findOne(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.treatmentsService.findOne(user, id), 'Treatment retrieved');
  }

  @Put(':id')
  @Policy('treatment.update')
  @ApiOperation({ summary: 'Update a treatment' })
  async update(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdateTreatmentDto,
  ) {
    return ok(await this.treatmentsService.update(user, id, dto), 'Treatment updated successfully');
  }

  @Patch(':id')
  @Policy('treatment.update')
  @ApiOperation({ summary: 'Partially update a treatment' })
  async partialUpdate(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdateTreatmentDto,
  ) {
    return this.update(user, id, dto);
  }

  @Delete(':id')
  @Policy('treatment.delete')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Soft-delete a treatment' })
  async remove(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    await this.treatmentsService.remove(user, id);
    return ok(null, 'Treatment deleted successfully');
  }

  @Post(':id/mark-completed')
  @Policy('treatment.update')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark a treatment as completed' })
  async markCompleted(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.treatmentsService.markCompleted(user, id), 'Treatment marked as completed');
  }

  @Post(':id/mark-cancelled')
  @Policy('treatment.update')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark a treatment as cancelled' })
  async markCancelled(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.treatmentsService.markCancelled(user, id), 'Treatment marked as cancelled');
  }

  @Post(':id/upload-image')
  @Policy('treatment.update')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Upload a treatment image as multipart `image` or JSON `uploadImage` data URI' })
  @ApiConsumes('multipart/form-data', 'application/json')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        image: { type: 'string', format: 'binary' },
        uploadImage: { type: 'string', description: 'data:image/png;base64,...' },
      },
    },
  })
  // Multer stops at twice the limit; anything between gets the 5MB validation message
  @UseInterceptors(FileInterceptor('image', { limits: { fileSize: MAX_IMAGE_BYTES * 2 } }))
  async uploadImage(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseIdPipe) id: number,
    @UploadedFile() file: UploadedImageFile | undefined,
    @Body() dto: UploadImageDto,
  ) {
    const image = file ? imageFromFile(file) : imageFromBody(dto.uploadImage, 'image');
    if (!image) {
      throw new ApiValidationException({ image: ['No image file provided.'] });
    }
    return ok(await this.treatmentsService.uploadImage(user, id, image), 'Image uploaded successfully');
  }

  @Get(':id/image')
  @Policy('treatment.read')
  @ApiOperation({ summary: 'Get a time-limited download link for the treatment image' })
  async image(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.treatmentsService.getImageLink(user, id), 'Image link generated');
  }

  @Post(':id/restore')
  @Policy('treatment.restore')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Restore a soft-deleted treatment' })
  async restore(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseIdPipe) id: number) {
    return ok(await this.treatmentsService.restore(user, id), 'Treatment restored successfully');
  }
}
