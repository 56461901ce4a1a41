import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { ImageListQueryDto } from './image-query.dto';
import { CreateImageDto } from './image.dto';

const messages = (errors: ValidationError[]) =>
  errors.flatMap((error) => Object.values(error.constraints ?? {}));

describe('ImageListQueryDto', () => {
  it.each(['img_code', 'createdAt,img_code', 'guid,updatedAt,file_ext'])(
    'accepts the field list %s',
    async (fields) => {
      const query = plainToInstance(ImageListQueryDto, { fields });
      expect(messages(await validate(query))).toEqual([]);
    },
  );

  it.each(['img_code,', 'img-code', 'guid, img_code', 'file1'])(
    'rejects the field list %s',
    async (fields) => {
      const query = plainToInstance(ImageListQueryDto, { fields });
      expect(messages(await validate(query))).toEqual([
        'fields must be a comma-separated list of field names',
      ]);
    },
  );
});

describe('CreateImageDto', () => {
  const body = (guid: string) =>
    plainToInstance(CreateImageDto, { user_id: 1, guid, platform: 1, img_code: 'front' });

  it('accepts guids without RFC version bits', async () => {
    const errors = await validate(body('11111111-1111-1111-1111-111111111111'));
    expect(messages(errors)).toEqual([]);
  });

  it('rejects identifiers that are not 36-character GUIDs', async () => {
    expect(messages(await validate(body('1111-1111')))).toEqual([
      'guid must be a 36-character GUID',
    ]);
  });
});
