import * as Joi from 'joi';
import { isCanonicalGuid, normalizeGuid } from './guid';
import { RecordEnvelope } from './types';

/*
 * Building blocks for per-table meta schemas. `null` counts as absent, so the
 * default applies to it as well as to a missing key.
 */

/** Numbers written into text columns are kept in their string form. */
export const text = () =>
  Joi.alternatives()
    .try(Joi.string().allow(''), Joi.number().cast('string'))
    .empty(null)
    .default('');

export const flag = () =>
  Joi.boolean().truthy(1, '1').falsy(0, '0').empty(null).default(false);

export const count = () => Joi.number().integer().empty(null).default(0);

export const number = () => Joi.number().empty(null).default(0);

/** Left as-is for the coercion utilities to interpret. */
export const raw = () => Joi.any();

export const guid = () =>
  Joi.string()
    .custom((value: string, helpers) =>
      isCanonicalGuid(value) ? normalizeGuid(value) : helpers.error('string.guid'),
    )
    .messages({ 'string.guid': '{{#label}} must be a canonical GUID' });

export const META_VALIDATION_OPTIONS: Joi.ValidationOptions = {
  abortEarly: false,
  convert: true,
  stripUnknown: true,
};

export const envelopeSchema = Joi.object<RecordEnvelope>({
  table: Joi.string().required(),
  guid: Joi.any(),
  user_id: Joi.number().integer().required(),
  platform: Joi.number().integer().required(),
  _modified: Joi.number().integer().empty(null).default(0),
  meta: Joi.object().unknown(true).empty(null).default({}),
}).unknown(true);
