import {
  Body,
  Controller,
  Get,
  Param,
  Patch,
  Post,
  Put,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ApiEnabledGuard } from '../common/guards/api-enabled.guard';
import { PageRequest, PaginationResult } from '../common/utils/paginate';
import { ImagePic } from '../logbook/entities/image-pic.entity';
import { ImageIdDto } from './dto/image-id.dto';
import { ImageListQueryDto, RecentImagesQueryDto } from './dto/image-query.dto';
import { CreateImageDto, UpdateImageDto } from './dto/image.dto';
import { ImagesService } from './images.service';

@ApiTags('images')
@Controller('images')
@UseGuards(ApiEnabledGuard)
export class ImagesController {
  constructor(private readonly imagesService: ImagesService) {}

  /**
   * Paginated image records. `fields=a,b` limits each result to those keys.
   */
  @Get()
  list(
    @Query() query: ImageListQueryDto,
    @Req() req: PageRequest,
  ): Promise<PaginationResult<Record<string, unknown>>> {
    return this.imagesService.findAll(
      { offset: query.offset, limit: query.limit, req },
      query.fields?.split(','),
    );
  }

  @Get('uploaded-and-downloaded')
  async uploadedAndDownloaded() {
    const images = await this.imagesService.uploadedAndDownloaded();
    return images.length > 0
      ? { images }
      : { images, message: 'No uploaded and downloadable images found.' };
  }

  @Get('recent')
  async recent(@Query() query: RecentImagesQueryDto) {
    const images = await this.imagesService.modifiedRecently(query.days);
    return images.length > 0
      ? { images }
      : { images, message: 'No recently modified images found.' };
  }

  @Get(':id')
  findOne(@Param() params: ImageIdDto): Promise<ImagePic> {
    return this.imagesService.findOne(params.id);
  }

  @Post()
  create(@Body() dto: CreateImageDto): Promise<ImagePic> {
    return this.imagesService.create(dto);
  }

  @Put(':id')
  replace(
    @Param() params: ImageIdDto,
    @Body() dto: CreateImageDto,
  ): Promise<ImagePic> {
    return this.imagesService.replace(params.id, dto);
  }

  @Patch(':id')
  update(
    @Param() params: ImageIdDto,
    @Body() dto: UpdateImageDto,
  ): Promise<ImagePic> {
    return this.imagesService.update(params.id, dto);
  }
}
