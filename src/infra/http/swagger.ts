import swaggerJsdoc from 'swagger-jsdoc';

const timestamp = { type: 'string', format: 'date-time' };
const nullableTimestamp = { type: 'string', format: 'date-time', nullable: true };

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'ForgeFlow Core API',
      version: '0.1.0',
      description: 'Projects, flows and flow runs, authenticated by API keys',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'API key',
        },
      },
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'INVALID_OR_EXPIRED',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Invalid or expired API key',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
        Identity: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            email: { type: 'string', format: 'email' },
            createdAt: timestamp,
          },
        },
        ApiKey: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            name: { type: 'string' },
            createdAt: timestamp,
            lastUsedAt: nullableTimestamp,
            expiresAt: nullableTimestamp,
          },
        },
        IssuedApiKey: {
          allOf: [
            { $ref: '#/components/schemas/ApiKey' },
            {
              type: 'object',
              properties: {
                secret: { type: 'string', example: 'ffk_…' },
              },
            },
          ],
        },
        Project: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            ownerId: { type: 'integer' },
            name: { type: 'string' },
            createdAt: timestamp,
            updatedAt: timestamp,
          },
        },
        Flow: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            projectId: { type: 'integer' },
            name: { type: 'string' },
            description: { type: 'string', nullable: true },
            createdAt: timestamp,
            updatedAt: timestamp,
          },
        },
        FlowRun: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            flowId: { type: 'integer' },
            status: {
              type: 'string',
              enum: ['pending', 'running', 'completed', 'failed', 'cancelled'],
            },
            createdAt: timestamp,
            startedAt: nullableTimestamp,
            completedAt: nullableTimestamp,
          },
        },
      },
    },
    tags: [
      { name: 'Health', description: 'Service status' },
      { name: 'Auth', description: 'Registration and password login' },
      { name: 'Identity', description: 'The authenticated caller' },
      { name: 'API Keys', description: 'Key issuance and revocation' },
      { name: 'Projects', description: 'Project management' },
      { name: 'Flows', description: 'Flows within projects' },
      { name: 'Runs', description: 'Flow run records' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export function buildSwaggerSpec(): object {
  return swaggerJsdoc(options);
}
