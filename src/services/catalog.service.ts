/**
 * Catalog service - product list → leaf stock records
 * Variable products are expanded through a FIFO work queue with depth and
 * request-count guards; a runaway variation tree becomes MalformedResponseError.
 */

import { z } from 'zod';
import type { CatalogConfig } from '../config.js';
import { MalformedResponseError, TransportError } from '../errors.js';
import { toQuantity } from '../types/decimal.js';
import type { StockRecord } from '../types/inventory.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const CatalogProductSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  type: z.string().optional(),
  stock_quantity: z.union([z.number(), z.string()]).nullable().optional(),
  variations: z.array(z.number().int()).default([]),
});

export type CatalogProduct = z.infer<typeof CatalogProductSchema>;

const CatalogProductListSchema = z.array(CatalogProductSchema);

interface QueueEntry {
  product: CatalogProduct;
  depth: number;
}

/** Full catalog → leaf StockRecords. Order is not meaningful. */
export async function fetchInventory(
  config: CatalogConfig,
  fetchImpl: FetchLike = fetch
): Promise<StockRecord[]> {
  const listUrl = `${config.apiBase}products/`;
  const raw = await getJson(listUrl, config, fetchImpl, null);
  const parsed = CatalogProductListSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const index = typeof issue?.path[0] === 'number' ? issue.path[0] : null;
    const productId = index !== null && Array.isArray(raw) ? rawId(raw[index]) : null;
    throw new MalformedResponseError(
      productId,
      `Unexpected product list from ${listUrl}` +
        (productId !== null ? ` (product ${productId})` : '') +
        `: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`,
      parsed.error
    );
  }

  const queue: QueueEntry[] = parsed.data.map((product) => ({ product, depth: 0 }));
  const records = new Map<number, StockRecord>();
  let requests = 0;

  for (let head = 0; head < queue.length; head++) {
    const { product, depth } = queue[head];

    if (product.variations.length === 0) {
      if (!records.has(product.id)) records.set(product.id, toStockRecord(product));
      continue;
    }

    if (depth >= config.maxDepth) {
      throw new MalformedResponseError(
        product.id,
        `Variation tree under product ${product.id} is deeper than ${config.maxDepth} levels`
      );
    }

    for (const variationId of product.variations) {
      requests++;
      if (requests > config.maxNodes) {
        throw new MalformedResponseError(
          product.id,
          `Variation expansion exceeded ${config.maxNodes} requests at product ${product.id}`
        );
      }
      const variation = await fetchProduct(variationId, config, fetchImpl);
      queue.push({ product: variation, depth: depth + 1 });
    }
  }

  return [...records.values()];
}

/** GET products/{id} */
export async function fetchProduct(
  productId: number,
  config: CatalogConfig,
  fetchImpl: FetchLike = fetch
): Promise<CatalogProduct> {
  const url = `${config.apiBase}products/${productId}`;
  const raw = await getJson(url, config, fetchImpl, productId);
  const parsed = CatalogProductSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseError(
      productId,
      `Unexpected payload for product ${productId}: ${parsed.error.issues
        .map((i) => `${i.path.join('.')} ${i.message}`)
        .join('; ')}`,
      parsed.error
    );
  }
  return parsed.data;
}

/** Leaf product → StockRecord; unmanaged stock (null) counts as 0 */
export function toStockRecord(product: CatalogProduct): StockRecord {
  const raw = product.stock_quantity ?? 0;
  let quantity: number;
  try {
    quantity = toQuantity(raw).toNumber();
  } catch (err) {
    throw new MalformedResponseError(
      product.id,
      `Product ${product.id} has non-numeric stock_quantity ${JSON.stringify(raw)}`,
      err
    );
  }
  if (!Number.isFinite(quantity)) {
    throw new MalformedResponseError(
      product.id,
      `Product ${product.id} has non-numeric stock_quantity ${JSON.stringify(raw)}`
    );
  }
  return { id: product.id, name: product.name, quantity };
}

function basicAuth(user: string, pass: string): string {
  return `Basic ${Buffer.from(`${user}:${pass}`).toString('base64')}`;
}

function rawId(value: unknown): number | null {
  if (typeof value === 'object' && value !== null && 'id' in value) {
    return typeof value.id === 'number' ? value.id : null;
  }
  return null;
}

async function getJson(
  url: string,
  config: CatalogConfig,
  fetchImpl: FetchLike,
  productId: number | null
): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), config.timeoutMs);

  try {
    let res: Response;
    try {
      res = await fetchImpl(url, {
        headers: {
          Accept: 'application/json',
          Authorization: basicAuth(config.apiUser, config.apiPass),
        },
        signal: controller.signal,
      });
    } catch (err) {
      const reason = controller.signal.aborted
        ? `timed out after ${config.timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : String(err);
      throw new TransportError(url, `GET ${url} failed: ${reason}`, null, err);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new TransportError(
        url,
        `Catalog API error: ${res.status} ${text.slice(0, 200)}`.trim(),
        res.status
      );
    }

    let body: string;
    try {
      body = await res.text();
    } catch (err) {
      throw new TransportError(url, `GET ${url} failed while reading body`, res.status, err);
    }

    try {
      return JSON.parse(body);
    } catch (err) {
      const what = productId === null ? 'product list' : `product ${productId}`;
      throw new MalformedResponseError(productId, `Response for ${what} is not JSON`, err);
    }
  } finally {
    clearTimeout(timer);
  }
}
