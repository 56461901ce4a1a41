import { Test } from '@nestjs/testing';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

describe('AppModule', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'logbook-app-'));
    const configPath = join(dir, 'config.yaml');
    writeFileSync(
      configPath,
      [
        'api:',
        '  enabled: true',
        'database:',
        `  path: ${join(dir, 'logbook.sqlite')}`,
        'import:',
        `  file: ${join(dir, 'import.json')}`,
        'export:',
        `  dir: ${join(dir, 'export')}`,
        'audit:',
        `  dir: ${dir}`,
        '',
      ].join('\n'),
    );
    process.env.LOGBOOK_CONFIG = configPath;
  });

  afterAll(() => {
    delete process.env.LOGBOOK_CONFIG;
    rmSync(dir, { recursive: true, force: true });
  });

  it('should compile the module without errors', async () => {
    // Configuration is read when the module file is evaluated.
    const { AppModule } = await import('./app.module');

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    expect(moduleRef).toBeDefined();
    await moduleRef.close();
  });
});
