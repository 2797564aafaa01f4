/**
 * OpenAPI 3.1 description of the explorer service itself, served at
 * `<mount>/doc.json` when no EXPLORER_DOC_FILE is configured.
 */

import { VERSION } from '../../version.js';

// ── Reusable components ──

const TextResponse = {
  content: { 'text/plain': { schema: { type: 'string' } } }
} as const;

function textResponse(description: string) {
  return { description, ...TextResponse };
}

// ── Document ──

export function buildServiceSpec(mountPath: string) {
  return {
    openapi: '3.1.0',
    info: {
      title: 'Swagger Explorer Service',
      version: VERSION,
      description: 'Serves the Swagger UI explorer and the description document it renders.',
      license: { name: 'MIT' }
    },

    paths: {
      '/health': {
        get: {
          tags: ['Core'],
          summary: 'Health check',
          operationId: 'getHealth',
          responses: {
            '200': {
              description: 'Service is up',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      status:    { type: 'string', enum: ['ok'] },
                      timestamp: { type: 'integer' },
                      version:   { type: 'string' }
                    },
                    required: ['status', 'timestamp', 'version']
                  }
                }
              }
            }
          }
        }
      },

      [`${mountPath}/`]: {
        get: {
          tags: ['Explorer'],
          summary: 'Redirect to the entry page',
          operationId: 'redirectToExplorer',
          responses: {
            '301': {
              description: 'Location points at index.html under the same prefix',
              headers: { Location: { schema: { type: 'string' } } }
            }
          }
        }
      },

      [`${mountPath}/index.html`]: {
        get: {
          tags: ['Explorer'],
          summary: 'Swagger UI entry page',
          operationId: 'getExplorerPage',
          responses: {
            '200': {
              description: 'Swagger UI HTML',
              content: { 'text/html': { schema: { type: 'string' } } }
            },
            '405': textResponse('Method not allowed'),
            '500': textResponse('Entry page could not be rendered')
          }
        }
      },

      [`${mountPath}/doc.json`]: {
        get: {
          tags: ['Explorer'],
          summary: 'API description document',
          operationId: 'getDescriptionDocument',
          responses: {
            '200': {
              description: 'The registered description document, verbatim',
              content: {
                'application/json': { schema: { type: 'object', additionalProperties: true } }
              }
            },
            '500': textResponse('Document missing or could not be generated')
          }
        }
      },

      [`${mountPath}/{asset}`]: {
        get: {
          tags: ['Explorer'],
          summary: 'Swagger UI bundle file',
          operationId: 'getExplorerAsset',
          parameters: [
            { name: 'asset', in: 'path', required: true, schema: { type: 'string' } }
          ],
          responses: {
            '200': { description: 'Asset bytes' },
            '404': textResponse('No such asset')
          }
        }
      }
    },

    tags: [
      { name: 'Core',     description: 'Health check' },
      { name: 'Explorer', description: 'Interactive API documentation' }
    ]
  };
}

export type ServiceSpec = ReturnType<typeof buildServiceSpec>;
