import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MoreThanOrEqual, Not, Repository } from 'typeorm';
import { paginate, PaginationParams, PaginationResult } from '../common/utils/paginate';
import { ImagePic } from '../logbook/entities/image-pic.entity';
import { CreateImageDto, UpdateImageDto } from './dto/image.dto';

export const DEFAULT_RECENT_DAYS = 1500;

const SECONDS_PER_DAY = 24 * 60 * 60;

export function pickFields(
  row: object,
  fields: readonly string[],
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(row).filter(([key]) => fields.includes(key)),
  );
}

@Injectable()
export class ImagesService {
  private readonly logger = new Logger(ImagesService.name);

  constructor(
    @InjectRepository(ImagePic)
    private readonly imageRepo: Repository<ImagePic>,
  ) {}

  async findAll(
    params: PaginationParams,
    fields?: string[],
  ): Promise<PaginationResult<Record<string, unknown>>> {
    if (fields) {
      const known = this.imageRepo.metadata.columns.map((c) => c.propertyName);
      const unknown = fields.filter((field) => !known.includes(field));
      if (unknown.length > 0) {
        throw new BadRequestException(`Unknown image fields: ${unknown.join(', ')}`);
      }
    }

    const page = await paginate(this.imageRepo, params, { order: { id: 'ASC' } });
    return {
      ...page,
      results: fields
        ? page.results.map((image) => pickFields(image, fields))
        : page.results.map((image) => ({ ...image })),
    };
  }

  async findOne(id: number): Promise<ImagePic> {
    const image = await this.imageRepo.findOne({ where: { id } });
    if (!image) {
      throw new NotFoundException(`Image ${id} not found`);
    }
    return image;
  }

  /** Images that have been both uploaded and downloaded by the device. */
  uploadedAndDownloaded(): Promise<ImagePic[]> {
    return this.imageRepo.find({
      where: { img_upload: true, img_download: true },
      order: { id: 'ASC' },
    });
  }

  /** `record_modified` is an epoch in seconds. */
  modifiedRecently(days = DEFAULT_RECENT_DAYS, now = Date.now()): Promise<ImagePic[]> {
    const cutoff = Math.floor(now / 1000) - days * SECONDS_PER_DAY;
    return this.imageRepo.find({
      where: { record_modified: MoreThanOrEqual(cutoff) },
      order: { record_modified: 'DESC' },
    });
  }

  async create(dto: CreateImageDto): Promise<ImagePic> {
    const guid = dto.guid.toLowerCase();
    await this.assertKeyFree(guid, dto.img_code);

    const image = await this.imageRepo.save(
      this.imageRepo.create({
        user_id: dto.user_id,
        guid,
        platform: dto.platform,
        modified: dto.modified ?? 0,
        img_code: dto.img_code,
        file_ext: dto.file_ext ?? '',
        file_name: dto.file_name ?? '',
        link_code: dto.link_code ?? '',
        img_upload: dto.img_upload ?? false,
        img_download: dto.img_download ?? false,
        record_modified: dto.record_modified ?? 0,
      }),
    );
    this.logger.log(`Created new ImagePic: ${image.img_code}`);
    return image;
  }

  async replace(id: number, dto: CreateImageDto): Promise<ImagePic> {
    return this.update(id, {
      modified: 0,
      file_ext: '',
      file_name: '',
      link_code: '',
      img_upload: false,
      img_download: false,
      record_modified: 0,
      ...dto,
    });
  }

  async update(id: number, dto: UpdateImageDto): Promise<ImagePic> {
    const image = await this.findOne(id);
    const guid = dto.guid?.toLowerCase() ?? image.guid;
    const imgCode = dto.img_code ?? image.img_code;
    if (guid !== image.guid || imgCode !== image.img_code) {
      await this.assertKeyFree(guid, imgCode, id);
    }

    this.imageRepo.merge(image, { ...dto, guid, img_code: imgCode });
    const saved = await this.imageRepo.save(image);
    this.logger.log(`Updated ImagePic: ${saved.img_code}`);
    return saved;
  }

  private async assertKeyFree(guid: string, imgCode: string, exceptId?: number) {
    const clash = await this.imageRepo.findOne({
      where: {
        guid,
        img_code: imgCode,
        ...(exceptId !== undefined ? { id: Not(exceptId) } : {}),
      },
    });
    if (clash) {
      throw new ConflictException(
        `Image ${imgCode} already exists for guid ${guid}`,
      );
    }
  }
}
