/**
 * Swagger UI explorer for Express — public surface.
 */

export { createExplorerHandler, wrapHandler, INDEX_PATH, DOCUMENT_PATH } from './handler.js';
export {
  newConfig,
  url,
  docExpansion,
  domId,
  instanceName,
  deepLinking,
  persistAuthorization,
  beforeScript,
  afterScript,
  plugins,
  uiConfig,
  assetServer,
  documentSource,
  renderer,
  DOC_EXPANSIONS,
} from './config.js';
export type { ExplorerConfig, ExplorerOption, DocExpansion } from './config.js';
export { resolvePath, splitUrl } from './path.js';
export type { ResolvedPath, SplitUrl } from './path.js';
export { PrefixLatch } from './prefix-latch.js';
export { contentTypeFor } from './content-type.js';
export {
  DocumentRegistry,
  JsonDocumentProvider,
  FileDocumentProvider,
  applyOverrides,
  DEFAULT_INSTANCE_NAME,
} from './registry.js';
export type { DocumentSource, DocumentProvider, DocumentInfoOverrides } from './registry.js';
export { StaticAssetServer, getDefaultAssetServer } from './assets.js';
export type { AssetServer } from './assets.js';
export { LiquidTemplateRenderer, INDEX_TEMPLATE, scriptJson, toTemplateContext } from './template.js';
export type { TemplateRenderer, TemplateContext } from './template.js';
export {
  ExplorerError,
  DocumentNotFoundError,
  DocumentGenerationError,
  DuplicateDocumentError,
  ConfigError,
} from './errors.js';
export type { ExplorerErrorCode } from './errors.js';
