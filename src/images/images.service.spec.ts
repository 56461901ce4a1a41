import {
  BadRequestException,
  ConflictException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { PageRequest } from '../common/utils/paginate';
import {
  inMemoryDatabase,
  mockAuditLogger,
  testConfig,
} from '../logbook/testing/in-memory-database';
import { CreateImageDto } from './dto/image.dto';
import { ImagesModule } from './images.module';
import { ImagesService, pickFields } from './images.service';

const GUID = '77777777-7777-7777-7777-777777777777';

const req: PageRequest = {
  protocol: 'http',
  path: '/images',
  get: () => 'localhost:3000',
};

const image = (overrides: Partial<CreateImageDto>): CreateImageDto => ({
  user_id: 1,
  guid: GUID,
  platform: 1,
  img_code: 'front',
  ...overrides,
});

describe('ImagesService', () => {
  let moduleRef: TestingModule;
  let service: ImagesService;

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [testConfig({ api: { enabled: true } }), inMemoryDatabase(), ImagesModule],
    })
      .overrideProvider(AuditLoggerService)
      .useValue(mockAuditLogger())
      .compile();

    service = moduleRef.get(ImagesService);

    await service.create(
      image({ img_code: 'front', file_ext: 'jpg', img_upload: true, img_download: true, record_modified: 1_699_990_000 }),
    );
    await service.create(
      image({ img_code: 'panel', file_ext: 'png', img_upload: true, record_modified: 1_699_950_000 }),
    );
    await service.create(
      image({ img_code: 'tail', file_ext: 'jpg', record_modified: 1_600_000_000 }),
    );
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('findAll', () => {
    it('paginates with next and previous links', async () => {
      const first = await service.findAll({ offset: 0, limit: 2, req });
      expect(first.count).toBe(3);
      expect(first.results).toHaveLength(2);
      expect(first.next).toBe('http://localhost:3000/images?offset=2&limit=2');
      expect(first.previous).toBeNull();

      const second = await service.findAll({ offset: 2, limit: 2, req });
      expect(second.results).toHaveLength(1);
      expect(second.next).toBeNull();
      expect(second.previous).toBe('http://localhost:3000/images?offset=0&limit=2');
    });

    it('restricts results to the requested fields', async () => {
      const page = await service.findAll({ req }, ['img_code', 'file_ext']);
      expect(page.results).toEqual([
        { img_code: 'front', file_ext: 'jpg' },
        { img_code: 'panel', file_ext: 'png' },
        { img_code: 'tail', file_ext: 'jpg' },
      ]);
    });

    it('rejects unknown fields', async () => {
      await expect(service.findAll({ req }, ['img_code', 'secret'])).rejects.toThrow(
        new BadRequestException('Unknown image fields: secret'),
      );
    });
  });

  it('pickFields keeps only the listed keys', () => {
    expect(pickFields({ a: 1, b: 2, c: 3 }, ['c', 'a'])).toEqual({ a: 1, c: 3 });
  });

  it('finds one image or reports it missing', async () => {
    const [front] = await service.uploadedAndDownloaded();
    await expect(service.findOne(front.id)).resolves.toMatchObject({ img_code: 'front' });
    await expect(service.findOne(999)).rejects.toBeInstanceOf(NotFoundException);
  });

  it('lists images both uploaded and downloaded', async () => {
    const images = await service.uploadedAndDownloaded();
    expect(images.map((i) => i.img_code)).toEqual(['front']);
  });

  it('lists recently modified images, newest first', async () => {
    const now = 1_700_000_000_000;

    const recent = await service.modifiedRecently(1, now);
    expect(recent.map((i) => i.img_code)).toEqual(['front', 'panel']);

    const all = await service.modifiedRecently(5000, now);
    expect(all.map((i) => i.img_code)).toEqual(['front', 'panel', 'tail']);
  });

  describe('create', () => {
    it('fills defaults and lower-cases the guid', async () => {
      const created = await service.create(
        image({ guid: 'ABCDEF01-2345-6789-ABCD-EF0123456789', img_code: 'nose' }),
      );
      expect(created).toMatchObject({
        guid: 'abcdef01-2345-6789-abcd-ef0123456789',
        img_code: 'nose',
        file_ext: '',
        img_upload: false,
        modified: 0,
      });
    });

    it('refuses a duplicate guid and image code', async () => {
      await expect(
        service.create(image({ guid: GUID.toUpperCase(), img_code: 'panel' })),
      ).rejects.toThrow(
        new ConflictException(`Image panel already exists for guid ${GUID}`),
      );
    });
  });

  describe('update', () => {
    it('changes only the given fields', async () => {
      const [front] = await service.uploadedAndDownloaded();

      const updated = await service.update(front.id, { file_name: 'front-view' });

      expect(updated).toMatchObject({
        img_code: 'front',
        file_ext: 'jpg',
        file_name: 'front-view',
        img_upload: true,
      });
    });

    it('refuses to move onto an existing key', async () => {
      const [front] = await service.uploadedAndDownloaded();
      await expect(service.update(front.id, { img_code: 'tail' })).rejects.toBeInstanceOf(
        ConflictException,
      );
    });

    it('replace resets omitted fields', async () => {
      const [front] = await service.uploadedAndDownloaded();

      const replaced = await service.replace(front.id, image({ img_code: 'front' }));

      expect(replaced).toMatchObject({
        img_code: 'front',
        file_ext: '',
        img_upload: false,
        img_download: false,
        record_modified: 0,
      });
    });
  });
});
