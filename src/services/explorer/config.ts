/**
 * Explorer configuration: defaults plus caller-supplied options, frozen once built.
 *
 *   const handler = createExplorerHandler(
 *     url('/api/docs/doc.json'),
 *     docExpansion('none'),
 *     deepLinking(false),
 *   );
 */

import type { AssetServer } from './assets.js';
import type { DocumentSource } from './registry.js';
import type { TemplateRenderer } from './template.js';
import { DEFAULT_INSTANCE_NAME } from './registry.js';

/** Values Swagger UI understands; anything else is handed to the page untouched. */
export const DOC_EXPANSIONS = ['list', 'full', 'none'] as const;
export type DocExpansion = typeof DOC_EXPANSIONS[number];

export interface ExplorerConfig {
  /** Where the rendered page fetches the description document from. */
  readonly url: string;
  readonly docExpansion: string;
  /** Id of the element Swagger UI mounts into (without the leading `#`). */
  readonly domId: string;
  /** Registry key of the description document served at `doc.json`. */
  readonly instanceName: string;
  readonly deepLinking: boolean;
  /** Keep authorization data across browser close/refresh. */
  readonly persistAuthorization: boolean;
  /** JavaScript run right before the Swagger UI object is created. */
  readonly beforeScript: string;
  /** JavaScript run right after the Swagger UI object is created and set on `window`. */
  readonly afterScript: string;
  /** Extra plugin expressions appended after `SwaggerUIBundle.plugins.DownloadUrl`. */
  readonly plugins: readonly string[];
  /** Extra `SwaggerUIBundle` properties; keys and values are emitted as JavaScript. */
  readonly uiConfig: Readonly<Record<string, string>>;
  readonly assetServer?: AssetServer;
  readonly documentSource?: DocumentSource;
  readonly renderer?: TemplateRenderer;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export type ExplorerOption = (config: Mutable<ExplorerConfig>) => void;

export function url(value: string): ExplorerOption {
  return (config) => { config.url = value; };
}

/** `list`, `full` or `none`. */
export function docExpansion(value: DocExpansion | string): ExplorerOption {
  return (config) => { config.docExpansion = value; };
}

export function domId(value: string): ExplorerOption {
  return (config) => { config.domId = value; };
}

/** An empty name falls back to `DEFAULT_INSTANCE_NAME`. */
export function instanceName(value: string): ExplorerOption {
  return (config) => { config.instanceName = value; };
}

export function deepLinking(value: boolean): ExplorerOption {
  return (config) => { config.deepLinking = value; };
}

export function persistAuthorization(value: boolean): ExplorerOption {
  return (config) => { config.persistAuthorization = value; };
}

export function beforeScript(js: string): ExplorerOption {
  return (config) => { config.beforeScript = js; };
}

export function afterScript(js: string): ExplorerOption {
  return (config) => { config.afterScript = js; };
}

export function plugins(values: readonly string[]): ExplorerOption {
  return (config) => { config.plugins = [...values]; };
}

export function uiConfig(props: Readonly<Record<string, string>>): ExplorerOption {
  return (config) => { config.uiConfig = { ...props }; };
}

/** Serve the UI bundle from this server instead of the process-wide default. */
export function assetServer(server: AssetServer): ExplorerOption {
  return (config) => { config.assetServer = server; };
}

/** Read description documents from this source instead of the default registry. */
export function documentSource(source: DocumentSource): ExplorerOption {
  return (config) => { config.documentSource = source; };
}

export function renderer(value: TemplateRenderer): ExplorerOption {
  return (config) => { config.renderer = value; };
}

export function newConfig(...options: ExplorerOption[]): ExplorerConfig {
  const config: Mutable<ExplorerConfig> = {
    url: 'doc.json',
    docExpansion: 'list',
    domId: 'swagger-ui',
    instanceName: DEFAULT_INSTANCE_NAME,
    deepLinking: true,
    persistAuthorization: false,
    beforeScript: '',
    afterScript: '',
    plugins: [],
    uiConfig: {},
  };

  for (const option of options) {
    option(config);
  }

  if (config.instanceName === '') {
    config.instanceName = DEFAULT_INSTANCE_NAME;
  }

  return Object.freeze({
    ...config,
    plugins: Object.freeze([...config.plugins]),
    uiConfig: Object.freeze({ ...config.uiConfig }),
  });
}
