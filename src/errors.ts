/**
 * Error taxonomy - every fatal error names the pipeline stage it came from
 */

export type Stage = 'config' | 'catalog' | 'storage' | 'notify';

export class InventoryCheckError extends Error {
  readonly stage: Stage;

  constructor(stage: Stage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

/** Missing or invalid environment configuration */
export class ConfigError extends InventoryCheckError {
  readonly variables: string[];

  constructor(message: string, variables: string[] = []) {
    super('config', message);
    this.variables = variables;
  }
}

/** Catalog unreachable, timed out or answered non-2xx */
export class TransportError extends InventoryCheckError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, status: number | null = null, cause?: unknown) {
    super('catalog', message, { cause });
    this.url = url;
    this.status = status;
  }
}

/** Catalog payload has an unexpected shape */
export class MalformedResponseError extends InventoryCheckError {
  readonly productId: number | null;

  constructor(productId: number | null, message: string, cause?: unknown) {
    super('catalog', message, { cause });
    this.productId = productId;
  }
}

/** Snapshot transaction failed and was rolled back */
export class StorageError extends InventoryCheckError {
  constructor(message: string, cause?: unknown) {
    super('storage', message, { cause });
  }
}

/** SMTP delivery failed; only ever returned, never thrown */
export class NotifyError extends InventoryCheckError {
  constructor(message: string, cause?: unknown) {
    super('notify', message, { cause });
  }
}
