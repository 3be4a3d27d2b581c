/**
 * Payload schemas for the three collections and their mapping to entities.
 * Payload fields are snake_case; entities are camelCase.
 */

import { z } from 'zod';
import type { Document, Relationship, Topic } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { RawPoint } from './utils.js';

export const documentPayloadSchema = z.object({
  title: z.string(),
  content: z.string(),
  summary: z.string().nullable().default(null),
  tags: z.array(z.string()).default([]),
  confidence: z.number().default(0.9),
  status: z.string().default('active'),
  metadata: z.object({
    source: z.string(),
    creator: z.string(),
    created: z.string(),
    updated: z.string(),
    version: z.number().int()
  })
});

export const topicPayloadSchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  parent_topic: z.string().nullable().default(null),
  metadata: z.object({
    created: z.string(),
    creator: z.string(),
    importance: z.number().default(0.5)
  })
});

export const relationshipPayloadSchema = z.object({
  from: z.string(),
  to: z.string(),
  type: z.string(),
  strength: z.number().default(0.5),
  bidirectional: z.boolean().default(false),
  metadata: z.object({
    created: z.string(),
    creator: z.string()
  })
});

export type DocumentPayload = z.infer<typeof documentPayloadSchema>;
export type TopicPayload = z.infer<typeof topicPayloadSchema>;
export type RelationshipPayload = z.infer<typeof relationshipPayloadSchema>;

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, point: RawPoint, kind: string): T | null {
  const parsed = schema.safeParse(point.payload ?? {});
  if (!parsed.success) {
    logger.warn(`Skipping ${kind} ${String(point.id)} with invalid payload: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    return null;
  }
  return parsed.data;
}

export function documentFromPoint(point: RawPoint, embedding: number[] | null): Document | null {
  const payload = parsePayload(documentPayloadSchema, point, 'document');
  if (!payload) return null;
  return { key: String(point.id), ...payload, embedding };
}

export function documentToPayload(doc: Document): DocumentPayload {
  return {
    title: doc.title,
    content: doc.content,
    summary: doc.summary,
    tags: doc.tags,
    confidence: doc.confidence,
    status: doc.status,
    metadata: doc.metadata
  };
}

export function topicFromPoint(point: RawPoint): Topic | null {
  const payload = parsePayload(topicPayloadSchema, point, 'topic');
  if (!payload) return null;
  return {
    key: String(point.id),
    name: payload.name,
    description: payload.description,
    parentTopic: payload.parent_topic,
    metadata: payload.metadata
  };
}

export function topicToPayload(topic: Topic): TopicPayload {
  return {
    name: topic.name,
    description: topic.description,
    parent_topic: topic.parentTopic,
    metadata: topic.metadata
  };
}

export function relationshipFromPoint(point: RawPoint): Relationship | null {
  const payload = parsePayload(relationshipPayloadSchema, point, 'relationship');
  if (!payload) return null;
  return { key: String(point.id), ...payload };
}

export function relationshipToPayload(rel: Relationship): RelationshipPayload {
  return {
    from: rel.from,
    to: rel.to,
    type: rel.type,
    strength: rel.strength,
    bidirectional: rel.bidirectional,
    metadata: rel.metadata
  };
}
