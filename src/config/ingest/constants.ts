export const INGEST_DEFAULTS = {
  retryAttempts: 3,
  retryBaseDelayMs: 500,
  processor: 'pdf-parse'
};

export const IMAGE_INGEST = {
  uploadPrefix: 'extracted_images',
  allowedExtensions: ['jpeg', 'jpg', 'png'],
  fallbackExtension: 'png'
};

export const VISION_LIMITS = {
  labels: 5,
  objects: 3,
  textChars: 100
};

export const INGEST_RATE_LIMIT = {
  perRequestDelayMs: 200
};
