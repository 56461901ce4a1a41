import * as Joi from 'joi';

export interface AppConfig {
  api: { enabled: boolean };
  database: { path: string };
  import: { file: string };
  export: { dir: string };
  audit: { dir: string };
}

const unixPath = (key: string) =>
  Joi.string()
    .required()
    .pattern(/^(\.\/|\/)?[\w\-\/\.]+$/)
    .message(`${key} must be a valid absolute or relative Unix path`);

export const configValidationSchema = Joi.object<AppConfig>({
  api: Joi.object({
    enabled: Joi.boolean().required(),
  }).required(),
  database: Joi.object({
    path: unixPath('database.path'),
  }).required(),
  import: Joi.object({
    file: unixPath('import.file'),
  }).required(),
  export: Joi.object({
    dir: unixPath('export.dir'),
  }).required(),
  audit: Joi.object({
    dir: unixPath('audit.dir'),
  }).default({ dir: './database' }),
});
