import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Portfolio CMS API',
      version: '1.0.0',
      description: 'Multi-tenant portfolio backend: profiles, projects, experience and public pages',
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
          bearerFormat: 'JWT',
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
              example: 'ACCESS_DENIED',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'You do not have access to this client',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
        User: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            username: { type: 'string' },
            email: { type: 'string', format: 'email' },
            role: { type: 'string', enum: ['admin', 'superadmin'] },
            lastLogin: { type: 'string', format: 'date-time', nullable: true },
            createdAt: { type: 'string', format: 'date-time' },
          },
        },
        ProfileInput: {
          type: 'object',
          properties: {
            name: { type: 'string' },
            lastName: { type: 'string' },
            email: { type: 'string', format: 'email' },
            currentTitle: { type: 'string', nullable: true },
            bioSummary: { type: 'string', maxLength: 500, nullable: true },
            phone: { type: 'string', nullable: true },
            location: { type: 'string', nullable: true },
            photoUrl: { type: 'string', nullable: true },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration, login and the current user' },
      { name: 'Profile', description: "The caller's profile" },
      { name: 'Work Experience', description: 'Positions held' },
      { name: 'Projects', description: 'Projects with technologies and preview images' },
      { name: 'Technologies', description: 'Skills and tools' },
      { name: 'Clients', description: 'Client testimonials' },
      { name: 'Social', description: 'Social links' },
      { name: 'Images', description: 'Image upload to object storage' },
      { name: 'Public', description: 'Unauthenticated portfolio reads by username' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
