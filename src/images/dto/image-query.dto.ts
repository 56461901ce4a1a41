import { IsInt, IsOptional, IsString, Matches, Min } from 'class-validator';
import { PaginationDto } from '../../common/dto/pagination.dto';

export class ImageListQueryDto extends PaginationDto {
  @IsOptional()
  @IsString()
  @Matches(/^[A-Za-z_]+(,[A-Za-z_]+)*$/, {
    message: 'fields must be a comma-separated list of field names',
  })
  fields?: string;
}

export class RecentImagesQueryDto {
  @IsOptional()
  @IsInt({ message: 'days must be an integer' })
  @Min(1)
  days?: number;
}
