/**
 * pino redaction paths. Log lines may carry environment overlays and
 * launch configurations, which can hold tokens for model hubs.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',

    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',

    // Environment maps logged with a launch
    'env.HF_TOKEN',
    'env.HUGGING_FACE_HUB_TOKEN',
    'env.OPENAI_API_KEY',
    'overlay.HF_TOKEN',
    'overlay.HUGGING_FACE_HUB_TOKEN',
    'overlay.OPENAI_API_KEY',
  ],
  censor: '[REDACTED]',
};
