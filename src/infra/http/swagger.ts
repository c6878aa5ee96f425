import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Medical Records Sharing API',
      version: '1.0.0',
      description: 'Doctors write medical records for patients; patients read records about them',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        cookieAuth: {
          type: 'apiKey',
          in: 'cookie',
          name: 'session_token',
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
              example: 'FORBIDDEN',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Access denied. Doctor role required.',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration, login and sessions' },
      { name: 'Doctor', description: 'Doctor dashboard and patient directory' },
      { name: 'Patient', description: 'Patient dashboard and doctor directory' },
      { name: 'Records', description: 'Medical records' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function buildOpenApiSpec(): Record<string, unknown> {
  const spec: unknown = swaggerJsdoc(options);
  if (!isJsonObject(spec)) {
    throw new Error('swagger-jsdoc returned a non-object specification');
  }
  return spec;
}
