import { z } from 'zod';
import type { Schemas } from '@qdrant/js-client-rest';
import type { QdrantConnection } from './connection.js';

export type QdrantFilter = Schemas['Filter'];
export type QdrantCondition = Schemas['Condition'];

export interface RawPoint {
  id: string | number;
  payload?: Record<string, unknown> | null;
  vector?: unknown;
}

const SCROLL_PAGE_SIZE = 256;

export function isValidUUID(uuid: string): boolean {
  const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
  return uuidRegex.test(uuid);
}

/**
 * Named vector for a dimension, e.g. `vs384`. Keeping the size in the name
 * lets a collection carry vectors of a new model next to the old ones.
 */
export function vectorName(dimension: number): string {
  return `vs${dimension}`;
}

const namedVectorsSchema = z.record(z.string(), z.unknown());
const denseVectorSchema = z.array(z.number());

export function extractNamedVector(raw: unknown, name: string): number[] | null {
  const named = namedVectorsSchema.safeParse(raw);
  if (!named.success) return null;
  const dense = denseVectorSchema.safeParse(named.data[name]);
  return dense.success ? dense.data : null;
}

/**
 * Reads every point of a collection (optionally filtered), page by page.
 */
export async function scrollAll(
  conn: QdrantConnection,
  collection: string,
  options: { filter?: QdrantFilter; withVector?: boolean } = {}
): Promise<RawPoint[]> {
  const points: RawPoint[] = [];
  let offset: string | number | undefined;
  for (;;) {
    const page = await conn.client.scroll(collection, {
      limit: SCROLL_PAGE_SIZE,
      with_payload: true,
      with_vector: options.withVector ?? false,
      ...(options.filter ? { filter: options.filter } : {}),
      ...(offset !== undefined ? { offset } : {})
    });
    points.push(...page.points);
    const next = page.next_page_offset;
    if (typeof next !== 'string' && typeof next !== 'number') break;
    offset = next;
  }
  return points;
}
