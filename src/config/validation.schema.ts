import * as Joi from 'joi';

const numberList = /^\s*\d+\s*(,\s*\d+\s*)*$/;

export const validationSchema = Joi.object({
  // Application
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'info', 'verbose', 'debug')
    .optional(),

  // Credentials: an auth token, or a username/password pair
  DBC_USERNAME: Joi.string().optional().allow(''),
  DBC_PASSWORD: Joi.string().optional().allow(''),
  DBC_AUTHTOKEN: Joi.string().optional().allow(''),

  // Transport
  DBC_TRANSPORT: Joi.string().valid('socket', 'http').default('socket'),
  DBC_HTTP_BASE_URL: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .optional(),
  DBC_SOCKET_HOST: Joi.string().hostname().optional(),
  DBC_SOCKET_PORTS: Joi.string()
    .optional()
    .pattern(numberList)
    .message('DBC_SOCKET_PORTS must be a comma-separated list of ports'),
  DBC_REQUEST_TIMEOUT_MS: Joi.number().integer().min(1).optional(),
  DBC_MAX_RECONNECT_ATTEMPTS: Joi.number().integer().min(1).max(10).optional(),

  // Polling
  DBC_TIMEOUT_SECONDS: Joi.number().integer().min(1).optional(),
  DBC_TOKEN_TIMEOUT_SECONDS: Joi.number().integer().min(1).optional(),
  DBC_POLL_INTERVALS_MS: Joi.string()
    .optional()
    .pattern(numberList)
    .message('DBC_POLL_INTERVALS_MS must be a comma-separated list of milliseconds'),
  DBC_POLL_DEFAULT_INTERVAL_MS: Joi.number().integer().min(1).optional(),
  DBC_RETRY_MAX_ATTEMPTS: Joi.number().integer().min(1).max(10).optional(),
  DBC_RETRY_BACKOFF_MS: Joi.number().integer().min(0).optional(),
  DBC_RETRY_MAX_BACKOFF_MS: Joi.number().integer().min(0).optional(),

  DBC_VERBOSE: Joi.boolean().optional().default(false),
});
