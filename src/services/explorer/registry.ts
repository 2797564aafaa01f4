/**
 * DocumentRegistry — maps instance names to description document providers.
 *
 * The handler only sees the `DocumentSource` side: given a name, produce the
 * document text or reject. Providers are asked on every read, so a document
 * generated from live data is always fresh.
 *
 * One process-wide registry exists by default (`getInstance()`); applications
 * that want isolation construct their own and pass it via `documentSource()`.
 */

import { readFile } from 'fs/promises';
import { logger } from '../../utils/logger.js';
import { DocumentGenerationError, DocumentNotFoundError, DuplicateDocumentError } from './errors.js';

/** Registry key used when the configuration leaves the instance name empty. */
export const DEFAULT_INSTANCE_NAME = 'swagger';

export interface DocumentSource {
  readDoc(name: string): Promise<string>;
}

export interface DocumentProvider {
  readDoc(): string | Promise<string>;
}

// ── Registry ─────────────────────────────────────────────────────────────────

export class DocumentRegistry implements DocumentSource {
  private static _instance: DocumentRegistry | null = null;

  private readonly providers = new Map<string, DocumentProvider>();

  static getInstance(): DocumentRegistry {
    if (!DocumentRegistry._instance) {
      DocumentRegistry._instance = new DocumentRegistry();
    }
    return DocumentRegistry._instance;
  }

  /** @internal */
  static _resetForTests(): void {
    DocumentRegistry._instance = null;
  }

  /** Throws `DuplicateDocumentError` if the name is taken. */
  register(name: string, provider: DocumentProvider): void {
    if (this.providers.has(name)) {
      throw new DuplicateDocumentError(name);
    }
    this.providers.set(name, provider);
    logger.info('REGISTRY', `Description document registered: ${name}`);
  }

  /** Returns false if nothing was registered under the name. */
  unregister(name: string): boolean {
    const removed = this.providers.delete(name);
    if (removed) {
      logger.info('REGISTRY', `Description document removed: ${name}`);
    }
    return removed;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  names(): string[] {
    return [...this.providers.keys()];
  }

  async readDoc(name: string): Promise<string> {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new DocumentNotFoundError(name);
    }

    try {
      return await provider.readDoc();
    } catch (err) {
      throw new DocumentGenerationError(name, err);
    }
  }
}

// ── Providers ────────────────────────────────────────────────────────────────

/**
 * Values written into the document's info block (and, for Swagger 2.0
 * documents, the server location fields) each time it is read.
 */
export interface DocumentInfoOverrides {
  title?: string;
  version?: string;
  description?: string;
  host?: string;
  basePath?: string;
  schemes?: string[];
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseDocument(text: string): JsonObject {
  const parsed: unknown = JSON.parse(text);
  if (!isJsonObject(parsed)) {
    throw new TypeError('Description document must be a JSON object');
  }
  return parsed;
}

export function applyOverrides(document: JsonObject, overrides: DocumentInfoOverrides): JsonObject {
  const info: JsonObject = isJsonObject(document.info) ? { ...document.info } : {};
  if (overrides.title !== undefined) info.title = overrides.title;
  if (overrides.version !== undefined) info.version = overrides.version;
  if (overrides.description !== undefined) info.description = overrides.description;

  const result: JsonObject = { ...document, info };
  if (overrides.host !== undefined) result.host = overrides.host;
  if (overrides.basePath !== undefined) result.basePath = overrides.basePath;
  if (overrides.schemes !== undefined) result.schemes = [...overrides.schemes];
  return result;
}

function hasOverrides(overrides: DocumentInfoOverrides | undefined): overrides is DocumentInfoOverrides {
  return overrides !== undefined && Object.values(overrides).some((v) => v !== undefined);
}

/**
 * Serves an in-memory document. A string is returned byte for byte unless
 * overrides are given; an object is serialised with `JSON.stringify`.
 */
export class JsonDocumentProvider implements DocumentProvider {
  constructor(
    private readonly document: string | JsonObject,
    private readonly overrides?: DocumentInfoOverrides
  ) {}

  readDoc(): string {
    if (!hasOverrides(this.overrides)) {
      return typeof this.document === 'string' ? this.document : JSON.stringify(this.document);
    }
    const parsed = typeof this.document === 'string' ? parseDocument(this.document) : this.document;
    return JSON.stringify(applyOverrides(parsed, this.overrides));
  }
}

/** Reads a JSON document from disk on every request. */
export class FileDocumentProvider implements DocumentProvider {
  constructor(
    private readonly filePath: string,
    private readonly overrides?: DocumentInfoOverrides
  ) {}

  async readDoc(): Promise<string> {
    const text = await readFile(this.filePath, 'utf-8');
    if (!hasOverrides(this.overrides)) {
      return text;
    }
    return JSON.stringify(applyOverrides(parseDocument(text), this.overrides));
  }
}
