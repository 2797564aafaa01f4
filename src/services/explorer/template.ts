/**
 * Entry page of the explorer: the Swagger UI bootstrap HTML, rendered from
 * the explorer configuration with LiquidJS.
 *
 * String settings are emitted as JSON literals with `<` escaped, so a value
 * cannot close the inline script; scripts, plugins and extra UI properties
 * are JavaScript supplied by the application and go in as is.
 */

import { Liquid } from 'liquidjs';
import type { Template } from 'liquidjs';
import type { ExplorerConfig } from './config.js';

export interface TemplateRenderer {
  render(config: ExplorerConfig): Promise<string>;
}

/** JSON literal safe inside a `<script>` element. */
export function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

/** What the template sees. */
export interface TemplateContext {
  url: string;
  docExpansion: string;
  domId: string;
  /** CSS selector for `domId`, as Swagger UI expects it. */
  domSelector: string;
  deepLinking: boolean;
  persistAuthorization: boolean;
  beforeScript: string;
  afterScript: string;
  plugins: readonly string[];
  uiConfig: Array<{ key: string; value: string }>;
}

export function toTemplateContext(config: ExplorerConfig): TemplateContext {
  return {
    url: config.url,
    docExpansion: config.docExpansion,
    domId: config.domId,
    domSelector: `#${config.domId}`,
    deepLinking: config.deepLinking,
    persistAuthorization: config.persistAuthorization,
    beforeScript: config.beforeScript,
    afterScript: config.afterScript,
    plugins: config.plugins,
    uiConfig: Object.keys(config.uiConfig)
      .sort()
      .map((key) => ({ key, value: config.uiConfig[key] })),
  };
}

export const INDEX_TEMPLATE = `<!-- HTML for static distribution bundle build -->
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Swagger UI</title>
  <link rel="stylesheet" type="text/css" href="./swagger-ui.css" >
  <link rel="icon" type="image/png" href="./favicon-32x32.png" sizes="32x32" />
  <link rel="icon" type="image/png" href="./favicon-16x16.png" sizes="16x16" />
  <style>
    html
    {
        box-sizing: border-box;
        overflow: -moz-scrollbars-vertical;
        overflow-y: scroll;
    }
    *,
    *:before,
    *:after
    {
        box-sizing: inherit;
    }

    body {
      margin:0;
      background: #fafafa;
    }
  </style>
</head>

<body>

<div id="{{ domId | escape }}"></div>

<script src="./swagger-ui-bundle.js"> </script>
<script src="./swagger-ui-standalone-preset.js"> </script>
<script>
window.onload = function() {
  {%- if beforeScript != "" %}
  {{ beforeScript }}
  {%- endif %}
  // Build a system
  const ui = SwaggerUIBundle({
    url: {{ url | script_json }},
    deepLinking: {{ deepLinking | script_json }},
    docExpansion: {{ docExpansion | script_json }},
    dom_id: {{ domSelector | script_json }},
    persistAuthorization: {{ persistAuthorization | script_json }},
    validatorUrl: null,
    presets: [
      SwaggerUIBundle.presets.apis,
      SwaggerUIStandalonePreset
    ],
    plugins: [
      SwaggerUIBundle.plugins.DownloadUrl
      {%- for plugin in plugins %},
      {{ plugin }}
      {%- endfor %}
    ],
    {%- for entry in uiConfig %}
    {{ entry.key }}: {{ entry.value }},
    {%- endfor %}
    layout: "StandaloneLayout"
  })

  window.ui = ui
  {%- if afterScript != "" %}
  {{ afterScript }}
  {%- endif %}
}
</script>
</body>

</html>
`;

/** Parses its template once; every render is independent. */
export class LiquidTemplateRenderer implements TemplateRenderer {
  private readonly engine: Liquid;
  private readonly template: Template[];

  constructor(source: string = INDEX_TEMPLATE) {
    this.engine = new Liquid({
      strictVariables: false,
      strictFilters: true,
    });
    this.engine.registerFilter('script_json', scriptJson);
    this.template = this.engine.parse(source);
  }

  render(config: ExplorerConfig): Promise<string> {
    return this.engine.render(this.template, toTemplateContext(config));
  }
}
