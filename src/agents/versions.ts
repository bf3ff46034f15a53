export const PROMPT_VERSIONS = {
  metadataExtraction: 'v1',
} as const;

export const SCHEMA_VERSIONS = {
  metadataExtraction: 'v1',
} as const;
