import type { DocumentMetadata, DocumentType, ExtraAttributes, Logger, MetadataScalar, VectorMetadata } from '../types/index.js';

export const RESERVED_METADATA_KEYS = ['type', 'owner_id', 'entity_id', 'text_preview', 'resume_id', 'job_id'] as const;

const RESERVED = new Set<string>(RESERVED_METADATA_KEYS);

export function isReservedMetadataKey(key: string): boolean {
  return RESERVED.has(key);
}

/**
 * Deterministic vector id; storing the same document again overwrites it.
 */
export function vectorId(type: DocumentType, ownerId: number, entityId: number): string {
  return `${type}_${ownerId}_${entityId}`;
}

function isScalar(value: unknown): value is MetadataScalar {
  return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
}

export interface BuildMetadataInput {
  type: DocumentType;
  ownerId: number;
  entityId: number;
  text: string;
  extra?: ExtraAttributes;
  previewChars?: number;
}

export function buildMetadata(input: BuildMetadataInput, logger?: Logger): DocumentMetadata {
  const { type, ownerId, entityId, text } = input;
  const previewChars = input.previewChars ?? 200;

  const extras: VectorMetadata = {};
  const dropped: string[] = [];
  for (const [key, value] of Object.entries(input.extra ?? {})) {
    if (isReservedMetadataKey(key) || !isScalar(value)) {
      dropped.push(key);
      continue;
    }
    extras[key] = value;
  }

  if (dropped.length > 0) {
    logger?.warn('Ignoring metadata keys', { type, entityId, ownerId, keys: dropped });
  }

  const metadata: DocumentMetadata = {
    ...extras,
    type,
    owner_id: ownerId,
    entity_id: entityId,
    text_preview: text.slice(0, previewChars)
  };
  metadata[type === 'resume' ? 'resume_id' : 'job_id'] = entityId;
  return metadata;
}

export function readNumber(metadata: VectorMetadata, key: string): number | undefined {
  const value = metadata[key];
  return typeof value === 'number' ? value : undefined;
}

export function readString(metadata: VectorMetadata, key: string): string {
  const value = metadata[key];
  return typeof value === 'string' ? value : '';
}
