import { PartialType } from '@nestjs/swagger';
import {
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  MinLength,
} from 'class-validator';
import { CANONICAL_GUID } from '../../import/guid';

export class CreateImageDto {
  @IsInt()
  user_id!: number;

  @IsString()
  @Matches(CANONICAL_GUID, { message: 'guid must be a 36-character GUID' })
  guid!: string;

  @IsInt()
  platform!: number;

  @IsOptional()
  @IsInt()
  modified?: number;

  @IsString()
  @MinLength(1)
  @MaxLength(64)
  img_code!: string;

  @IsOptional()
  @IsString()
  @MaxLength(16)
  file_ext?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  file_name?: string;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  link_code?: string;

  @IsOptional()
  @IsBoolean()
  img_upload?: boolean;

  @IsOptional()
  @IsBoolean()
  img_download?: boolean;

  @IsOptional()
  @IsInt()
  record_modified?: number;
}

export class UpdateImageDto extends PartialType(CreateImageDto) {}
