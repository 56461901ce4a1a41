import { IsInt, Min } from 'class-validator';

export class ImageIdDto {
  @IsInt({ message: 'Image id must be an integer' })
  @Min(1)
  id!: number;
}
