import * as Joi from 'joi';
import { ValidationException } from '../exceptions';

/**
 * Joi schemas for values handed to the captcha clients directly, outside of
 * the environment.
 */

export const credentialsSchema = Joi.alternatives()
  .try(
    Joi.object({
      username: Joi.string().trim().min(1).required(),
      password: Joi.string().min(1).required(),
    }),
    Joi.object({
      authtoken: Joi.string().trim().min(1).required(),
    }),
  )
  .required()
  .messages({
    'alternatives.match':
      'credentials must be either a username and password, or an authtoken',
    'any.required': 'credentials are required',
  });

const positiveInteger = Joi.number().integer().min(1);

export const clientOptionsSchema = Joi.object({
  timeouts: Joi.object({
    defaultTimeoutSeconds: positiveInteger,
    defaultTokenTimeoutSeconds: positiveInteger,
  }),
  polling: Joi.object({
    intervalsMs: Joi.array().items(Joi.number().integer().min(0)),
    defaultIntervalMs: Joi.number().integer().min(0),
  }),
  retry: Joi.object({
    maxAttempts: positiveInteger.max(10),
    backoffMs: Joi.number().integer().min(0),
    maxBackoffMs: Joi.number().integer().min(0),
  }),
  http: Joi.object({
    baseUrl: Joi.string().uri({ scheme: ['http', 'https'] }),
    requestTimeoutMs: positiveInteger,
  }),
  socket: Joi.object({
    host: Joi.string().hostname(),
    ports: Joi.array().items(Joi.number().port()).min(1),
    connectTimeoutMs: positiveInteger,
    requestTimeoutMs: positiveInteger,
    maxReconnectAttempts: positiveInteger.max(10),
  }),
  verbose: Joi.boolean(),
}).unknown(true);

/**
 * Validates `value` against `schema`, turning Joi failures into a
 * ValidationException that lists every failing field.
 */
export function assertValid(
  schema: Joi.Schema,
  value: unknown,
  message: string,
): void {
  const { error } = schema.validate(value, { abortEarly: false });
  if (!error) {
    return;
  }

  throw new ValidationException(
    `${message}: ${error.message}`,
    error.details.map((detail) => ({
      field: detail.path.join('.') || undefined,
      message: detail.message,
      code: detail.type,
    })),
  );
}
